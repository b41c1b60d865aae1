/**
 * Centralized Path Management
 *
 * Single source of truth for all paths in the application.
 */

import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root directory (parent of src/ and dist/)
 */
export const REPO_ROOT = path.resolve(__dirname, '..');

/**
 * Instapaper credentials file (sensitive, gitignored)
 */
export const CREDENTIALS_FILE = path.join(REPO_ROOT, 'instapaper.config.json');

/**
 * Example credentials file shipped with the repo
 */
export const CREDENTIALS_EXAMPLE_FILE = path.join(REPO_ROOT, 'instapaper.config.example.json');

/**
 * .env file path
 */
export const ENV_FILE = path.join(REPO_ROOT, '.env');
