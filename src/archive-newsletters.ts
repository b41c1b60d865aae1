#!/usr/bin/env node
/**
 * Archive Newsletters CLI
 *
 * One-shot pass, meant for cron. Exits 0 once the pass completes, even if
 * some archive calls failed.
 */

import './env.js';

import { runArchivePass } from './archive-runner.js';
import { loadCredentials } from './credentials.js';
import { env } from './env.js';
import { toErrorMessage } from './utils/errors.js';

async function main(): Promise<void> {
  const credentials = await loadCredentials();
  await runArchivePass({ credentials, verbose: env.DEBUG });
  process.exit(0);
}

main().catch((error) => {
  console.error(`Failed to archive newsletters: ${toErrorMessage(error)}`);
  console.error('Next steps: check instapaper.config.json (or INSTAPAPER_* env vars) and your network connection.');
  process.exit(1);
});
