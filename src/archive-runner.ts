import { selectAndArchive, selectForArchive } from './archiver.js';
import { config, daysToMs, getArchiveSettings } from './config.js';
import { getAccessToken, InstapaperClient } from './instapaper/client.js';
import type { AccessToken, ArchiveOutcome, ArchiveSettings, ArchiveSummary, Bookmark, Credentials } from './types.js';

/** The two remote calls a pass depends on */
export interface BookmarkService {
  listBookmarks(tag: string, limit: number): Promise<Bookmark[]>;
  archiveBookmark(id: string): Promise<boolean>;
}

export interface ArchiveRunOptions {
  credentials: Credentials;
  settings?: ArchiveSettings;
  listLimit?: number;
  now?: Date;
  verbose?: boolean;
  authenticate?: (credentials: Credentials) => Promise<AccessToken>;
  createClient?: (credentials: Credentials, token: AccessToken) => BookmarkService;
}

export function describeAge(ms: number): string {
  const days = ms / daysToMs(1);
  if (Number.isInteger(days)) {
    return days === 1 ? '1 day' : `${days} days`;
  }
  const hours = Math.round(ms / 3_600_000);
  return hours === 1 ? '1 hour' : `${hours} hours`;
}

function printOutcome(outcome: ArchiveOutcome): void {
  const { title } = outcome.bookmark;
  if (outcome.archived) {
    console.log(`✓ Archived: ${title}`);
    return;
  }
  const reason = outcome.error ? ` (${outcome.error})` : '';
  console.error(`✗ Failed to archive: ${title}${reason}`);
}

/**
 * Authenticate, list the tagged bookmarks and archive the old ones.
 *
 * Authentication and listing errors propagate; individual archive
 * failures only show up in the summary.
 */
export async function runArchivePass(options: ArchiveRunOptions): Promise<ArchiveSummary> {
  const {
    credentials,
    settings = getArchiveSettings(),
    listLimit = config.api.listLimit,
    now = new Date(),
    verbose = false,
    authenticate = getAccessToken,
    createClient = (creds, token) => new InstapaperClient(creds, token),
  } = options;

  console.log('Authenticating with Instapaper...');
  const token = await authenticate(credentials);
  if (verbose) console.log(`[Debug] Authenticated as ${credentials.username}`);

  const client = createClient(credentials, token);

  console.log(`Fetching '${settings.tag}' bookmarks...`);
  const bookmarks = await client.listBookmarks(settings.tag, listLimit);
  console.log(`Found ${bookmarks.length} bookmarks with '${settings.tag}' tag`);
  if (verbose && bookmarks.length === listLimit) {
    console.log(`[Debug] List hit the ${listLimit} item limit; older bookmarks wait for the next run`);
  }

  const selected = selectForArchive(bookmarks, settings, now);
  console.log(`Found ${selected.length} bookmarks older than ${describeAge(settings.maxAgeMs)}`);

  if (selected.length === 0) {
    console.log(bookmarks.length === 0 ? 'No bookmarks to process' : 'No bookmarks to archive');
  }

  const summary = await selectAndArchive(bookmarks, settings, (id) => client.archiveBookmark(id), {
    now,
    onOutcome: printOutcome,
  });

  console.log(`\nSummary: ${summary.archived} archived, ${summary.failed} failed, ${summary.skipped} skipped`);
  return summary;
}
