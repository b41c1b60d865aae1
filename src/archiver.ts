/**
 * Archiver Pass
 *
 * Selects tagged bookmarks older than the cutoff and archives them one at a
 * time. A failed archive is recorded and the pass moves on; nothing is
 * retried.
 */

import type { ArchiveFn, ArchiveOutcome, ArchiveSettings, ArchiveSummary, Bookmark } from './types.js';
import { toErrorMessage } from './utils/errors.js';

export interface ArchivePassOptions {
  /** Reference time for age calculation. Default: now */
  now?: Date;
  /** Called after each archive call settles */
  onOutcome?: (outcome: ArchiveOutcome) => void;
}

function assertValidSettings(settings: ArchiveSettings): void {
  if (!Number.isFinite(settings.maxAgeMs) || settings.maxAgeMs < 0) {
    throw new RangeError(`Invalid max age: ${settings.maxAgeMs}ms`);
  }
}

/**
 * True when the bookmark carries `tag` and is strictly older than `maxAgeMs`.
 * A bookmark exactly `maxAgeMs` old is kept.
 */
export function isArchivable(bookmark: Bookmark, settings: ArchiveSettings, now: Date): boolean {
  const ageMs = now.getTime() - bookmark.createdAt.getTime();
  return bookmark.tags.includes(settings.tag) && ageMs > settings.maxAgeMs;
}

export function selectForArchive(bookmarks: readonly Bookmark[], settings: ArchiveSettings, now: Date = new Date()): Bookmark[] {
  assertValidSettings(settings);
  return bookmarks.filter((b) => isArchivable(b, settings, now));
}

export async function selectAndArchive(
  bookmarks: readonly Bookmark[],
  settings: ArchiveSettings,
  archiveFn: ArchiveFn,
  options: ArchivePassOptions = {}
): Promise<ArchiveSummary> {
  const selected = selectForArchive(bookmarks, settings, options.now);
  const outcomes: ArchiveOutcome[] = [];

  for (const bookmark of selected) {
    let outcome: ArchiveOutcome;
    try {
      outcome = { bookmark, archived: await archiveFn(bookmark.id) };
    } catch (e) {
      outcome = { bookmark, archived: false, error: toErrorMessage(e) };
    }
    outcomes.push(outcome);
    options.onOutcome?.(outcome);
  }

  const archived = outcomes.filter((o) => o.archived).length;

  return {
    fetched: bookmarks.length,
    selected: selected.length,
    archived,
    failed: outcomes.length - archived,
    skipped: bookmarks.length - selected.length,
    outcomes,
  };
}
