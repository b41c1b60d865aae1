/**
 * Credential Loading
 *
 * Reads the Instapaper credentials record from instapaper.config.json
 * (gitignored, sensitive), falling back to INSTAPAPER_* environment
 * variables when the file does not exist.
 */

import { chmod, readFile, stat } from 'fs/promises';
import path from 'path';
import { config } from './config.js';
import { env } from './env.js';
import { CREDENTIALS_EXAMPLE_FILE, CREDENTIALS_FILE } from './paths.js';
import type { Credentials } from './types.js';
import { ConfigError, isNotFoundError, toErrorMessage } from './utils/errors.js';

export type CredentialEnv = Partial<
  Record<
    | 'INSTAPAPER_CONFIG'
    | 'INSTAPAPER_CONSUMER_KEY'
    | 'INSTAPAPER_CONSUMER_SECRET'
    | 'INSTAPAPER_USERNAME'
    | 'INSTAPAPER_PASSWORD',
    string | undefined
  >
>;

export interface LoadCredentialsOptions {
  /** Credentials file. Default: INSTAPAPER_CONFIG or instapaper.config.json */
  file?: string;
  env?: CredentialEnv;
}

/**
 * Ensure the credentials file has owner-only permissions
 */
async function ensureSecurePermissions(filepath: string): Promise<void> {
  if (!config.security.checkFilePermissions) return;

  try {
    const stats = await stat(filepath);
    const mode = stats.mode & 0o777;

    if (mode & 0o077) {
      console.warn(`Warning: ${filepath} has insecure permissions (${mode.toString(8)}), fixing...`);
      await chmod(filepath, config.security.sensitiveFileMode);
    }
  } catch (e) {
    if (!isNotFoundError(e)) {
      console.warn(`Warning: Could not check permissions on ${filepath}`);
    }
  }
}

function requireString(fields: Map<string, unknown>, key: string, source: string): string {
  const value = fields.get(key);
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigError(`Missing or invalid "${key}" in ${source}`);
  }
  return value.trim();
}

/**
 * Validate a parsed credentials record. `password` is optional; some
 * Instapaper accounts have none.
 */
export function parseCredentialsRecord(value: unknown, source: string): Credentials {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`Expected a JSON object in ${source}`);
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const password = fields.get('password') ?? '';
  if (typeof password !== 'string') {
    throw new ConfigError(`Invalid "password" in ${source}: expected a string`);
  }

  return {
    consumerKey: requireString(fields, 'consumer_key', source),
    consumerSecret: requireString(fields, 'consumer_secret', source),
    username: requireString(fields, 'username', source),
    password,
  };
}

function credentialsFromEnv(vars: CredentialEnv): Credentials | null {
  const consumerKey = vars.INSTAPAPER_CONSUMER_KEY;
  const consumerSecret = vars.INSTAPAPER_CONSUMER_SECRET;
  const username = vars.INSTAPAPER_USERNAME;
  if (!consumerKey || !consumerSecret || !username) return null;

  return { consumerKey, consumerSecret, username, password: vars.INSTAPAPER_PASSWORD ?? '' };
}

export async function loadCredentials(options: LoadCredentialsOptions = {}): Promise<Credentials> {
  const vars = options.env ?? env;
  const filepath = path.resolve(options.file ?? vars.INSTAPAPER_CONFIG ?? CREDENTIALS_FILE);

  let data: string;
  try {
    await ensureSecurePermissions(filepath);
    data = await readFile(filepath, 'utf-8');
  } catch (e) {
    if (!isNotFoundError(e)) throw e;

    const fromEnv = credentialsFromEnv(vars);
    if (fromEnv) return fromEnv;

    throw new ConfigError(
      `Configuration file not found at ${filepath}. ` +
        `Create it with your credentials (see ${path.basename(CREDENTIALS_EXAMPLE_FILE)} for the format), ` +
        'or set INSTAPAPER_CONSUMER_KEY, INSTAPAPER_CONSUMER_SECRET and INSTAPAPER_USERNAME.'
    );
  }

  if (!data.trim()) {
    throw new ConfigError(`Corrupted configuration file (empty): ${filepath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (parseError) {
    throw new ConfigError(`Corrupted configuration file: ${filepath} - ${toErrorMessage(parseError)}`, {
      cause: parseError,
    });
  }

  return parseCredentialsRecord(parsed, filepath);
}
