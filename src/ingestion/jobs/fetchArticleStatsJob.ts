/**
 * Daily stats job
 * Collects per-article stats, fills in publication dates, reads the follower count
 * and merges everything into the history files.
 */

import path from 'path';
import { StatsConfig, checkCookieExpiry, logCookieExpiry, validateCookie } from '../../config';
import { DatesCache } from '../../data/datesCache';
import { saveArticlesHistory, saveDailySummary, saveFollowerHistory } from '../../data/historyWriter';
import { StatsApi, StatsJob, StatsRunResult } from '../../types';
import { formatDay, formatTime } from '../../utils/dates';
import { ArticleCollector } from '../articleCollector';
import { NoteApiClient } from '../client/noteApiClient';
import { DateEnricher } from '../dateEnricher';

export interface StatsFiles {
  articles: string;
  summary: string;
  followers: string;
  datesCache: string;
}

export function statsFiles(dataDir: string): StatsFiles {
  return {
    articles: path.join(dataDir, 'articles.csv'),
    summary: path.join(dataDir, 'daily_summary.csv'),
    followers: path.join(dataDir, 'followers.csv'),
    datesCache: path.join(dataDir, 'dates_cache.json'),
  };
}

export interface FetchArticleStatsJobOptions {
  api?: StatsApi;
  now?: () => Date;
  pageDelayMs?: number;
  detailDelayMs?: number;
}

export class FetchArticleStatsJob implements StatsJob {
  name = 'fetchArticleStats';

  private readonly api: StatsApi;
  private readonly now: () => Date;
  private readonly files: StatsFiles;

  constructor(private readonly config: StatsConfig, private readonly options: FetchArticleStatsJobOptions = {}) {
    this.api = options.api ?? new NoteApiClient(config);
    this.now = options.now ?? (() => new Date());
    this.files = statsFiles(config.dataDir);
  }

  /**
   * Run once. Configuration and stats endpoint failures throw before any
   * history file is touched.
   */
  async run(): Promise<StatsRunResult> {
    const { timeZone } = this.config;
    const today = formatDay(this.now(), timeZone);
    console.log(`Date: ${today}`);

    validateCookie(this.config.cookie);
    logCookieExpiry(checkCookieExpiry(this.config.cookieSetDate, today));

    console.log('\n📊 Fetching article stats...');
    const collector = new ArticleCollector(this.api, { pageDelayMs: this.options.pageDelayMs });
    const collected = await collector.collect();

    console.log('\n📅 Resolving publication dates...');
    const cache = await DatesCache.load(this.files.datesCache);
    const enricher = new DateEnricher(this.api, cache, {
      detailDelayMs: this.options.detailDelayMs,
      timeZone,
    });
    const enrichment = await enricher.enrich(collected.articles, today);

    console.log('\n👥 Fetching follower count...');
    const followerCount = await this.api.fetchFollowerCount(this.config.username);
    if (followerCount !== undefined) {
      console.log(`  → Followers: ${followerCount}`);
    }

    console.log('\n💾 Saving data...');
    const articlesResult = await saveArticlesHistory(this.files.articles, today, enrichment.articles);

    const observedAt = this.now();
    await saveDailySummary(this.files.summary, {
      today,
      totals: collected,
      articleCount: enrichment.articles.length,
      followerCount,
      updatedAt: formatTime(observedAt, timeZone),
    });

    const followerRowAppended = await saveFollowerHistory(this.files.followers, followerCount, {
      date: formatDay(observedAt, timeZone),
      time: formatTime(observedAt, timeZone),
    });

    return {
      date: today,
      articleCount: enrichment.articles.length,
      totals: {
        totalPv: collected.totalPv,
        totalLike: collected.totalLike,
        totalComment: collected.totalComment,
      },
      followerCount,
      detailsFetched: enrichment.fetched,
      detailsCached: enrichment.cached,
      articleRowsReplaced: articlesResult.replaced,
      followerRowAppended,
    };
  }
}
