/**
 * Instapaper Full API Client
 *
 * xAuth token exchange plus the two bookmark calls the archiver needs.
 * Every request is an OAuth 1.0a (HMAC-SHA1) signed, form-encoded POST.
 */

import { createHmac } from 'node:crypto';
import OAuth from 'oauth-1.0a';
import { config } from '../config.js';
import type { AccessToken, Bookmark, Credentials, InstapaperTag, RawInstapaperBookmark } from '../types.js';

export class InstapaperApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'InstapaperApiError';
    this.status = status;
    this.body = body;
  }
}

export class AuthenticationError extends InstapaperApiError {
  constructor(message: string, status: number, body: string) {
    super(message, status, body);
    this.name = 'AuthenticationError';
  }
}

export interface ClientOptions {
  baseUrl?: string;
}

function createSigner(credentials: Credentials): OAuth {
  return new OAuth({
    consumer: { key: credentials.consumerKey, secret: credentials.consumerSecret },
    signature_method: 'HMAC-SHA1',
    hash_function(baseString, key) {
      return createHmac('sha1', key).update(baseString).digest('base64');
    },
  });
}

async function signedPost(
  signer: OAuth,
  url: string,
  data: Record<string, string>,
  token?: AccessToken
): Promise<Response> {
  const authorization = signer.authorize({ url, method: 'POST', data }, token);

  return fetch(url, {
    method: 'POST',
    headers: {
      ...signer.toHeader(authorization),
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: new URLSearchParams(data).toString(),
  });
}

/**
 * Exchange username/password for an access token (xAuth).
 * The password may be empty for accounts that never set one.
 */
export async function getAccessToken(credentials: Credentials, options: ClientOptions = {}): Promise<AccessToken> {
  const baseUrl = options.baseUrl ?? config.api.baseUrl;
  const response = await signedPost(createSigner(credentials), `${baseUrl}/oauth/access_token`, {
    x_auth_username: credentials.username,
    x_auth_password: credentials.password,
    x_auth_mode: 'client_auth',
  });

  const text = await response.text();
  if (response.status !== 200) {
    throw new AuthenticationError(`Error getting access token: ${response.status} ${text}`, response.status, text);
  }

  // Response is form-encoded: oauth_token_secret=...&oauth_token=...
  const params = new URLSearchParams(text);
  const key = params.get('oauth_token');
  const secret = params.get('oauth_token_secret');
  if (!key || !secret) {
    throw new AuthenticationError('Access token response is missing oauth_token or oauth_token_secret', response.status, text);
  }

  return { key, secret };
}

function isTag(value: unknown): value is InstapaperTag {
  return !!value && typeof value === 'object' && 'name' in value && typeof value.name === 'string';
}

function isRawBookmark(value: unknown): value is RawInstapaperBookmark {
  return (
    !!value &&
    typeof value === 'object' &&
    'type' in value &&
    value.type === 'bookmark' &&
    'bookmark_id' in value &&
    typeof value.bookmark_id === 'number' &&
    'time' in value &&
    typeof value.time === 'number'
  );
}

/**
 * Pull bookmark objects out of a `bookmarks/list` payload.
 *
 * The classic response is `[user, bookmark, bookmark, ...]`; newer API
 * versions return `{ user, bookmarks: [...], highlights: [...] }`.
 */
export function parseBookmarkList(payload: unknown): RawInstapaperBookmark[] {
  let items: unknown[] = [];
  if (Array.isArray(payload)) {
    items = payload;
  } else if (payload && typeof payload === 'object' && 'bookmarks' in payload && Array.isArray(payload.bookmarks)) {
    items = payload.bookmarks;
  }
  return items.filter(isRawBookmark);
}

/**
 * Convert an API bookmark to the archiver's record shape.
 *
 * `listedTag` is the tag the list was filtered by; it stands in for the
 * tag set when the API leaves `tags` out.
 */
export function normalizeBookmark(raw: RawInstapaperBookmark, listedTag?: string): Bookmark {
  let tags: string[] = [];
  if (Array.isArray(raw.tags)) {
    tags = raw.tags.filter(isTag).map((t) => t.name);
  } else if (listedTag) {
    tags = [listedTag];
  }

  return {
    id: String(raw.bookmark_id),
    tags,
    createdAt: new Date(raw.time * 1000),
    title: raw.title || 'Untitled',
    url: raw.url ?? '',
  };
}

export class InstapaperClient {
  private readonly signer: OAuth;
  private readonly token: AccessToken;
  private readonly baseUrl: string;

  constructor(credentials: Credentials, token: AccessToken, options: ClientOptions = {}) {
    this.signer = createSigner(credentials);
    this.token = token;
    this.baseUrl = options.baseUrl ?? config.api.baseUrl;
  }

  /**
   * List unread bookmarks carrying `tag`. The API takes either a folder or
   * a tag, not both.
   */
  async listBookmarks(tag: string, limit: number = config.api.listLimit): Promise<Bookmark[]> {
    const response = await signedPost(
      this.signer,
      `${this.baseUrl}/bookmarks/list`,
      { limit: String(limit), tag },
      this.token
    );

    const text = await response.text();
    if (response.status !== 200) {
      throw new InstapaperApiError(`Error fetching bookmarks: ${response.status} ${text}`, response.status, text);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new InstapaperApiError('Error fetching bookmarks: response is not valid JSON', response.status, text);
    }

    return parseBookmarkList(payload).map((raw) => normalizeBookmark(raw, tag));
  }

  /**
   * Move a bookmark to the archive folder. Resolves false on a non-200
   * response; transport errors reject.
   */
  async archiveBookmark(id: string): Promise<boolean> {
    const response = await signedPost(this.signer, `${this.baseUrl}/bookmarks/archive`, { bookmark_id: id }, this.token);
    // Body is unused; release the connection
    await response.body?.cancel();
    return response.status === 200;
  }
}
