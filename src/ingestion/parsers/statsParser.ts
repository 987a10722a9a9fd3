/**
 * Parsers for the stats and creator envelopes
 */

import { ArticleStat, StatsPage } from '../../types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** Non-negative integer; anything unreadable counts as 0 */
export function toCount(value: unknown): number {
  let parsed = NaN;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim()) {
    parsed = Number(value.replace(/,/g, ''));
  }
  return Number.isFinite(parsed) && parsed > 0 ? Math.trunc(parsed) : 0;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

export function parseArticleStat(raw: unknown): ArticleStat | null {
  if (!isRecord(raw)) return null;

  const key = toText(raw.key).trim();
  if (!key) {
    console.warn('  ⚠️  Skipping stats item without key', raw.id ?? '');
    return null;
  }

  return {
    id: toText(raw.id),
    key,
    title: toText(raw.name) || toText(raw.title),
    readCount: toCount(raw.read_count),
    likeCount: toCount(raw.like_count),
    commentCount: toCount(raw.comment_count),
  };
}

/**
 * Parse one page of the stats envelope. Returns null when the envelope lacks
 * `data.note_stats`, which the API does when the session is not accepted.
 */
export function parseStatsPage(body: unknown): StatsPage | null {
  if (!isRecord(body) || !isRecord(body.data)) return null;

  const data = body.data;
  if (!Array.isArray(data.note_stats)) return null;

  const articles: ArticleStat[] = [];
  for (const item of data.note_stats) {
    const article = parseArticleStat(item);
    if (article) articles.push(article);
  }

  return {
    articles,
    totalPv: toCount(data.total_pv),
    totalLike: toCount(data.total_like),
    totalComment: toCount(data.total_comment),
    // A missing flag ends pagination
    lastPage: data.last_page === undefined || data.last_page === null ? true : Boolean(data.last_page),
  };
}

export function parseFollowerCount(body: unknown): number | undefined {
  if (!isRecord(body) || !isRecord(body.data)) return undefined;

  const value = body.data.followerCount;
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return Math.trunc(value);
  if (typeof value === 'string' && /^\d[\d,]*$/.test(value.trim())) {
    return Number(value.trim().replace(/,/g, ''));
  }
  return undefined;
}
