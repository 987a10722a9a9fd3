/**
 * History files: merges each run into the articles, daily summary and follower CSVs.
 * Same-day reruns replace that day's rows instead of adding to them.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ArticleRecord, StatsTotals } from '../types';
import { toSlashDay } from '../utils/dates';
import {
  CsvRow,
  CsvValue,
  headerMatches,
  isMissingFile,
  parseCSV,
  readTable,
  toCsv,
  toCsvLine,
  writeFileAtomic,
  writeTable,
} from './csv';

export const ARTICLES_HEADER = [
  'date',
  'note_id',
  'key',
  'title',
  'published_at',
  'created_at',
  'updated_at',
  'age_days',
  'read_count',
  'like_count',
  'comment_count',
];

export const SUMMARY_COLUMNS = {
  date: '日付',
  totalPv: 'ビュー合計',
  totalLike: 'スキ合計',
  articleCount: '記事数',
  viewsPerArticle: 'ビュー/記事',
  likesPerArticle: 'スキ/記事',
  likeRate: 'スキ率(%)',
  viewChange: 'ビュー前日比(%)',
  likeChange: 'スキ前日比(%)',
  likeRateChange: 'スキ率前日比(%)',
  followerCount: 'フォロワー数',
  updatedAt: '更新時刻',
} as const;

export type SummaryColumn = keyof typeof SUMMARY_COLUMNS;

const SUMMARY_ORDER: SummaryColumn[] = [
  'date',
  'totalPv',
  'totalLike',
  'articleCount',
  'viewsPerArticle',
  'likesPerArticle',
  'likeRate',
  'viewChange',
  'likeChange',
  'likeRateChange',
  'followerCount',
  'updatedAt',
];

export const SUMMARY_HEADER: string[] = SUMMARY_ORDER.map((column) => SUMMARY_COLUMNS[column]);

export const FOLLOWER_COLUMNS = {
  date: '日付',
  time: '時刻',
  followerCount: 'フォロワー数',
} as const;

export const FOLLOWERS_HEADER: string[] = Object.values(FOLLOWER_COLUMNS);

/** Rows of a file, or nothing if it is missing or has a different header */
async function readCompatibleRows(filepath: string, header: string[]): Promise<CsvRow[]> {
  const table = await readTable(filepath);
  if (!table) return [];
  if (!headerMatches(table.header, header)) {
    console.warn(`  ⚠️  ${filepath} has an outdated header. Migrating to the current format.`);
    return [];
  }
  return table.rows;
}

function pick(row: CsvRow, header: string[]): Record<string, CsvValue> {
  const picked: Record<string, CsvValue> = {};
  for (const column of header) {
    picked[column] = row[column] ?? '';
  }
  return picked;
}

export function toArticleRow(today: string, article: ArticleRecord): Record<string, CsvValue> {
  return {
    date: today,
    note_id: article.id,
    key: article.key,
    title: article.title,
    published_at: article.publishedAt,
    created_at: article.createdAt,
    updated_at: article.updatedAt,
    age_days: article.ageDays,
    read_count: article.readCount,
    like_count: article.likeCount,
    comment_count: article.commentCount,
  };
}

/**
 * Write today's article rows after every other day's rows, dropping any rows
 * already recorded for today.
 */
export async function saveArticlesHistory(
  filepath: string,
  today: string,
  articles: ArticleRecord[]
): Promise<{ written: number; replaced: number }> {
  const existing = await readCompatibleRows(filepath, ARTICLES_HEADER);
  const kept = existing.filter((row) => row.date !== today);
  const replaced = existing.length - kept.length;
  if (replaced > 0) {
    console.log(`  → Overwriting ${replaced} existing rows for ${today}`);
  }

  await writeTable(filepath, ARTICLES_HEADER, [
    ...kept.map((row) => pick(row, ARTICLES_HEADER)),
    ...articles.map((article) => toArticleRow(today, article)),
  ]);

  console.log(`  → Wrote ${articles.length} rows to ${filepath}`);
  return { written: articles.length, replaced };
}

export interface SummaryInput {
  today: string; // YYYY-MM-DD
  totals: StatsTotals;
  articleCount: number;
  followerCount?: number;
  updatedAt: string; // HH:MM:SS
}

export type SummaryRow = Record<SummaryColumn, string | number>;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function readNumber(row: CsvRow | undefined, column: string): number {
  const value = Number((row?.[column] ?? '').replace(/,/g, ''));
  return Number.isFinite(value) ? value : 0;
}

/** Percentage change from `previous`; 0 when there is nothing to compare against */
export function percentChange(current: number, previous: number): number {
  if (previous <= 0) return 0;
  return ((current - previous) / previous) * 100;
}

/**
 * Compute the summary row for a day. `previous` is the most recent row of any
 * other day, which is not necessarily yesterday.
 */
export function computeSummaryRow(input: SummaryInput, previous?: CsvRow): SummaryRow {
  const { totalPv, totalLike } = input.totals;
  const count = input.articleCount;

  const viewsPerArticle = count > 0 ? totalPv / count : 0;
  const likesPerArticle = count > 0 ? totalLike / count : 0;
  const likeRate = totalPv > 0 ? (totalLike / totalPv) * 100 : 0;

  const previousPv = readNumber(previous, SUMMARY_COLUMNS.totalPv);
  const previousLike = readNumber(previous, SUMMARY_COLUMNS.totalLike);
  const previousRate = readNumber(previous, SUMMARY_COLUMNS.likeRate);

  return {
    date: toSlashDay(input.today),
    totalPv,
    totalLike,
    articleCount: count,
    viewsPerArticle: round2(viewsPerArticle),
    likesPerArticle: round2(likesPerArticle),
    likeRate: round2(likeRate),
    viewChange: round2(percentChange(totalPv, previousPv)),
    likeChange: round2(percentChange(totalLike, previousLike)),
    likeRateChange: round2(percentChange(likeRate, previousRate)),
    followerCount: input.followerCount ?? '',
    updatedAt: input.updatedAt,
  };
}

function toSummaryCsvRow(row: SummaryRow): Record<string, CsvValue> {
  const csvRow: Record<string, CsvValue> = {};
  for (const column of SUMMARY_ORDER) {
    csvRow[SUMMARY_COLUMNS[column]] = row[column];
  }
  return csvRow;
}

/**
 * Replace today's summary row, computing day-over-day changes against the last
 * row that is not today's.
 */
export async function saveDailySummary(filepath: string, input: SummaryInput): Promise<SummaryRow> {
  const day = toSlashDay(input.today);
  const existing = await readCompatibleRows(filepath, SUMMARY_HEADER);
  const others = existing.filter((row) => row[SUMMARY_COLUMNS.date] !== day);
  const previous = others.length > 0 ? others[others.length - 1] : undefined;

  const summary = computeSummaryRow(input, previous);
  await writeTable(filepath, SUMMARY_HEADER, [
    ...others.map((row) => pick(row, SUMMARY_HEADER)),
    toSummaryCsvRow(summary),
  ]);

  console.log(`  → Updated ${filepath} (${day})`);
  return summary;
}

/** The last non-empty follower count in the history, scanning from the end */
export function lastFollowerCount(rows: CsvRow[]): number | undefined {
  for (let i = rows.length - 1; i >= 0; i--) {
    const value = (rows[i][FOLLOWER_COLUMNS.followerCount] ?? '').trim();
    if (!value) continue;
    const normalized = value.replace(/,/g, '');
    return /^\d+$/.test(normalized) ? Number(normalized) : undefined;
  }
  return undefined;
}

/** `followers.csv` → `followers.legacy-20240310.csv`, beside the original */
export function legacyFollowersPath(filepath: string, day: string): string {
  const { dir, name, ext } = path.parse(filepath);
  return path.join(dir, `${name}.legacy-${day.replace(/\D/g, '')}${ext}`);
}

/**
 * Append a follower observation only when the count changed since the last
 * recorded one. Returns whether a row was written. A file under a different
 * header is moved aside rather than overwritten.
 */
export async function saveFollowerHistory(
  filepath: string,
  followerCount: number | undefined,
  observedAt: { date: string; time: string }
): Promise<boolean> {
  if (followerCount === undefined) {
    console.warn('  ⚠️  Follower count unavailable. Skipping follower history.');
    return false;
  }

  let text = '';
  try {
    text = await fs.readFile(filepath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  const table = parseCSV(text);
  const compatible = table.header.length > 0 && headerMatches(table.header, FOLLOWERS_HEADER);
  const lastCount = compatible ? lastFollowerCount(table.rows) : undefined;

  if (lastCount === followerCount) {
    console.log(`  🟰 Follower count unchanged (${followerCount}). Skipping write.`);
    return false;
  }

  const row: Record<string, CsvValue> = {
    [FOLLOWER_COLUMNS.date]: toSlashDay(observedAt.date),
    [FOLLOWER_COLUMNS.time]: observedAt.time,
    [FOLLOWER_COLUMNS.followerCount]: followerCount,
  };

  if (compatible) {
    const separator = text.endsWith('\n') ? '' : '\n';
    const line = toCsvLine(table.header.map((column) => row[column]));
    await fs.appendFile(filepath, `${separator}${line}\n`, 'utf-8');
  } else {
    if (text.trim()) {
      const legacyPath = legacyFollowersPath(filepath, observedAt.date);
      await fs.rename(filepath, legacyPath);
      console.warn(`  ⚠️  ${filepath} has an outdated header. Moved it to ${legacyPath} and started a new history.`);
    }
    await writeFileAtomic(filepath, toCsv(FOLLOWERS_HEADER, [row]));
  }

  const previous = lastCount !== undefined ? String(lastCount) : 'unknown';
  console.log(
    `  ✅ Follower change detected → appended ${toSlashDay(observedAt.date)} ${observedAt.time} ${followerCount} (previous: ${previous})`
  );
  return true;
}
