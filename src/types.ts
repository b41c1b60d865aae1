/**
 * Type Definitions for the Newsletter Archiver
 *
 * Data shapes shared between the API client, the archiver pass and the runner.
 */

// ============================================
// Bookmarks
// ============================================

/** A saved link as seen by the archiver pass. */
export interface Bookmark {
  id: string;
  tags: string[];
  createdAt: Date;
  title: string;
  url: string;
}

export interface InstapaperTag {
  id?: number;
  name: string;
}

/** Bookmark object as returned by `bookmarks/list` */
export interface RawInstapaperBookmark {
  type: 'bookmark';
  bookmark_id: number;
  url?: string;
  title?: string;
  description?: string;
  time: number; // Unix timestamp (seconds)
  starred?: string;
  private_source?: string;
  hash?: string;
  progress?: number;
  progress_timestamp?: number;
  tags?: InstapaperTag[];
}

// ============================================
// Credentials & Auth
// ============================================

export interface Credentials {
  consumerKey: string;
  consumerSecret: string;
  username: string;
  password: string;
}

/** OAuth token pair returned by the xAuth exchange */
export interface AccessToken {
  key: string;
  secret: string;
}

// ============================================
// Archiving
// ============================================

export interface ArchiveSettings {
  tag: string;
  maxAgeMs: number;
}

/** Resolves true when the bookmark was archived */
export type ArchiveFn = (id: string) => Promise<boolean>;

export interface ArchiveOutcome {
  bookmark: Bookmark;
  archived: boolean;
  error?: string;
}

export interface ArchiveSummary {
  fetched: number;
  selected: number;
  archived: number;
  failed: number;
  skipped: number;
  outcomes: ArchiveOutcome[];
}

// ============================================
// Application Config
// ============================================

export interface AppConfig {
  api: {
    baseUrl: string;
    listLimit: number;
  };
  archive: {
    tag: string;
    maxAgeDays: number;
  };
  security: {
    checkFilePermissions: boolean;
    sensitiveFileMode: number;
  };
}
