/**
 * Date enricher
 * Fills in publication timestamps from the cache, refreshing entries through the
 * detail endpoint when they are missing or stale.
 */

import { setTimeout as sleep } from 'timers/promises';
import { DatesCache } from '../data/datesCache';
import { ArticleRecord, ArticleStat, StatsApi } from '../types';
import { calcAgeDays } from '../utils/dates';
import { hasAnyField } from './parsers/detailParser';

export const DETAIL_DELAY_MS = 200;

export interface DateEnricherOptions {
  detailDelayMs?: number;
  timeZone: string;
}

export interface EnrichmentResult {
  articles: ArticleRecord[];
  fetched: number;
  cached: number;
}

export class DateEnricher {
  private readonly detailDelayMs: number;
  private readonly timeZone: string;

  constructor(
    private readonly api: Pick<StatsApi, 'fetchArticleDetail'>,
    private readonly cache: DatesCache,
    options: DateEnricherOptions
  ) {
    this.detailDelayMs = options.detailDelayMs ?? DETAIL_DELAY_MS;
    this.timeZone = options.timeZone;
  }

  async enrich(articles: ArticleStat[], today: string): Promise<EnrichmentResult> {
    const enriched: ArticleRecord[] = [];
    let fetched = 0;

    for (const article of articles) {
      const record: ArticleRecord = { ...article };
      const entry = this.cache.get(article.key);

      if (entry && !this.cache.isStale(entry, today)) {
        record.publishedAt = entry.published_at || undefined;
        record.createdAt = entry.created_at || undefined;
        record.updatedAt = entry.updated_at || undefined;
      } else {
        const fields = await this.api.fetchArticleDetail(article.key);
        fetched++;

        record.publishedAt = fields.publishedAt;
        record.createdAt = fields.createdAt;
        record.updatedAt = fields.updatedAt;

        // An empty result is a failed lookup; leave the old entry so the next run retries
        if (hasAnyField(fields)) {
          this.cache.put(article.key, {
            published_at: fields.publishedAt ?? '',
            created_at: fields.createdAt ?? '',
            updated_at: fields.updatedAt ?? '',
            fetched_at: today,
          });
        } else if (entry) {
          record.publishedAt = entry.published_at || undefined;
          record.createdAt = entry.created_at || undefined;
          record.updatedAt = entry.updated_at || undefined;
        }

        if (fetched % 10 === 0) {
          console.log(`    ${fetched} details fetched...`);
        }
        if (this.detailDelayMs > 0) await sleep(this.detailDelayMs);
      }

      record.ageDays = calcAgeDays(today, record.publishedAt, this.timeZone);
      enriched.push(record);
    }

    const cached = articles.length - fetched;
    console.log(`  → ${fetched} of ${articles.length} articles fetched from the detail API (${cached} from cache)`);

    await this.cache.save();

    return { articles: enriched, fetched, cached };
  }
}
