/**
 * Client for the platform's private stats API
 * Every request carries the session cookie; only the stats endpoint is mandatory.
 */

import { StatsConfig } from '../../config';
import { DetailFields, StatsApi, StatsPage } from '../../types';
import { extractDetailFields } from '../parsers/detailParser';
import { isRecord, parseFollowerCount, parseStatsPage } from '../parsers/statsParser';

export const USER_AGENT = 'article-stats-tracker';
const REQUEST_TIMEOUT_MS = 10000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type StatsApiErrorKind = 'auth' | 'http' | 'network' | 'malformed';

export class StatsApiError extends Error {
  constructor(
    public readonly kind: StatsApiErrorKind,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'StatsApiError';
  }
}

export interface NoteApiClientOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export class NoteApiClient implements StatsApi {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    private readonly config: Pick<StatsConfig, 'cookie' | 'baseUrl' | 'username'>,
    options: NoteApiClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  static statsPath(page: number): string {
    return `/api/v1/stats/pv?filter=all&page=${page}&sort=pv`;
  }

  static detailPath(key: string): string {
    return `/api/v3/notes/${encodeURIComponent(key)}`;
  }

  static creatorPath(username: string): string {
    return `/api/v2/creators/${encodeURIComponent(username)}`;
  }

  /**
   * Fetch one page of per-article stats. Any failure is fatal for the run and
   * surfaces as a StatsApiError.
   */
  async fetchPage(page: number): Promise<StatsPage> {
    let response: Response;
    try {
      response = await this.request(NoteApiClient.statsPath(page));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new StatsApiError('network', `Network error while fetching stats page ${page}: ${message}`);
    }

    if (response.status === 401 || response.status === 403) {
      throw new StatsApiError(
        'auth',
        `Authentication error (${response.status}) on stats page ${page}. Update NOTE_COOKIE.`,
        response.status
      );
    }
    if (!response.ok) {
      throw new StatsApiError('http', `HTTP error ${response.status} on stats page ${page}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new StatsApiError('malformed', `Stats page ${page} is not valid JSON`, response.status);
    }

    const parsed = parseStatsPage(body);
    if (!parsed) {
      const keys = isRecord(body) ? Object.keys(body).join(', ') : typeof body;
      throw new StatsApiError(
        'malformed',
        `Stats page ${page} has no data.note_stats (response keys: ${keys}). The cookie may be invalid.`,
        response.status
      );
    }
    return parsed;
  }

  /**
   * Fetch the timestamps of one article. Failures are logged and yield an
   * empty result.
   */
  async fetchArticleDetail(key: string): Promise<DetailFields> {
    try {
      const response = await this.request(NoteApiClient.detailPath(key));
      if (!response.ok) {
        console.warn(`    ⚠️  Detail API error (${key}): HTTP ${response.status}`);
        return {};
      }
      const body: unknown = await response.json();
      return extractDetailFields(isRecord(body) ? body.data : undefined);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`    ⚠️  Detail API error (${key}): ${message}`);
      return {};
    }
  }

  /**
   * Current follower count, or undefined when no username is configured or the
   * lookup fails.
   */
  async fetchFollowerCount(username: string | undefined = this.config.username): Promise<number | undefined> {
    if (!username) {
      console.warn('⚠️  NOTE_USERNAME is not set. Skipping follower count.');
      return undefined;
    }

    try {
      const response = await this.request(NoteApiClient.creatorPath(username));
      if (!response.ok) {
        console.warn(`  ⚠️  Follower lookup failed: HTTP ${response.status}`);
        return undefined;
      }
      const count = parseFollowerCount(await response.json());
      if (count === undefined) {
        console.warn('  ⚠️  Follower count missing from creator response');
      }
      return count;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`  ⚠️  Follower lookup failed: ${message}`);
      return undefined;
    }
  }

  /**
   * Preflight: confirm the stats endpoint accepts the cookie before a run
   */
  async verifyAuth(): Promise<StatsPage> {
    console.log('\n🔑 Checking authentication...');
    const page = await this.fetchPage(1);
    console.log('✓ Authentication OK');
    return page;
  }

  private request(path: string): Promise<Response> {
    return this.fetchImpl(`${this.config.baseUrl}${path}`, {
      headers: {
        Cookie: this.config.cookie,
        'User-Agent': USER_AGENT,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}
