/**
 * Application Configuration
 *
 * Centralized configuration with typed defaults.
 */

import type { AppConfig, ArchiveSettings } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const config: AppConfig = {
  api: {
    baseUrl: 'https://www.instapaper.com/api/1',
    // Maximum the list endpoint allows per request
    listLimit: 500,
  },

  archive: {
    tag: 'newsletter',
    maxAgeDays: 7,
  },

  security: {
    checkFilePermissions: true,
    sensitiveFileMode: 0o600,
  },
};

// Freeze config to prevent accidental mutation
Object.freeze(config);
Object.freeze(config.api);
Object.freeze(config.archive);
Object.freeze(config.security);

export function daysToMs(days: number): number {
  return days * DAY_MS;
}

/**
 * Settings for one archiver pass, derived from the static config.
 */
export function getArchiveSettings(): ArchiveSettings {
  return {
    tag: config.archive.tag,
    maxAgeMs: daysToMs(config.archive.maxAgeDays),
  };
}
