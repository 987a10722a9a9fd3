/**
 * Core types for the article stats tracker
 */

/** One article as reported by the paginated stats endpoint */
export interface ArticleStat {
  id: string;
  key: string; // Slug used for detail lookups
  title: string;
  readCount: number;
  likeCount: number;
  commentCount: number;
}

/** Slow-changing timestamps resolved from the detail endpoint */
export interface DetailFields {
  publishedAt?: string;
  createdAt?: string;
  updatedAt?: string;
}

/** An article snapshot after date enrichment */
export interface ArticleRecord extends ArticleStat, DetailFields {
  ageDays?: number; // Unknown when publishedAt is missing or unparsable
}

export interface StatsTotals {
  totalPv: number;
  totalLike: number;
  totalComment: number;
}

export interface StatsPage extends StatsTotals {
  articles: ArticleStat[];
  lastPage: boolean;
}

export interface CollectedArticles extends StatsTotals {
  articles: ArticleStat[];
  pages: number;
}

export interface CacheEntry {
  published_at: string;
  created_at: string;
  updated_at: string;
  fetched_at: string; // YYYY-MM-DD, empty when never refreshed
}

/** Minimal surface of the remote API the collector and enricher depend on */
export interface StatsApi {
  fetchPage(page: number): Promise<StatsPage>;
  fetchArticleDetail(key: string): Promise<DetailFields>;
  fetchFollowerCount(username?: string): Promise<number | undefined>;
}

export interface StatsRunResult {
  date: string;
  articleCount: number;
  totals: StatsTotals;
  followerCount?: number;
  detailsFetched: number;
  detailsCached: number;
  articleRowsReplaced: number;
  followerRowAppended: boolean;
}

export interface StatsJob {
  name: string;
  run(): Promise<StatsRunResult>;
}
