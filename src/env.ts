/**
 * Environment Configuration
 *
 * Loads environment variables from .env file.
 * Must be imported before any other modules that need env vars.
 */

import dotenv from 'dotenv';
import { ENV_FILE } from './paths.js';

dotenv.config({ path: ENV_FILE });

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export const env = {
  get INSTAPAPER_CONFIG(): string | undefined {
    return nonEmpty(process.env.INSTAPAPER_CONFIG);
  },
  get INSTAPAPER_CONSUMER_KEY(): string | undefined {
    return nonEmpty(process.env.INSTAPAPER_CONSUMER_KEY);
  },
  get INSTAPAPER_CONSUMER_SECRET(): string | undefined {
    return nonEmpty(process.env.INSTAPAPER_CONSUMER_SECRET);
  },
  get INSTAPAPER_USERNAME(): string | undefined {
    return nonEmpty(process.env.INSTAPAPER_USERNAME);
  },
  // Not trimmed: a password may legitimately carry whitespace
  get INSTAPAPER_PASSWORD(): string | undefined {
    return process.env.INSTAPAPER_PASSWORD;
  },
  get DEBUG(): boolean {
    return process.env.DEBUG === 'true' || process.env.DEBUG === '1';
  },
};
