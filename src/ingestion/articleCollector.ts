/**
 * Article collector
 * Walks the stats endpoint page by page until the server flags the last page.
 */

import { setTimeout as sleep } from 'timers/promises';
import { ArticleStat, CollectedArticles, StatsApi } from '../types';

export const PAGE_DELAY_MS = 1000;

export interface ArticleCollectorOptions {
  pageDelayMs?: number;
}

export class ArticleCollector {
  private readonly pageDelayMs: number;

  constructor(private readonly api: Pick<StatsApi, 'fetchPage'>, options: ArticleCollectorOptions = {}) {
    this.pageDelayMs = options.pageDelayMs ?? PAGE_DELAY_MS;
  }

  /**
   * Every page repeats the account totals; only the first page's are used.
   * An article listed again on a later page keeps its first row.
   * Errors from the API propagate untouched.
   */
  async collect(): Promise<CollectedArticles> {
    const articles: ArticleStat[] = [];
    const seen = new Set<string>();
    const add = (items: ArticleStat[], page: number): void => {
      for (const article of items) {
        if (seen.has(article.key)) {
          console.warn(`  ⚠️  Article ${article.key} repeated on page ${page}. Keeping the first occurrence.`);
          continue;
        }
        seen.add(article.key);
        articles.push(article);
      }
    };
    let page = 1;

    console.log(`  Fetching page ${page}...`);
    const first = await this.api.fetchPage(page);
    add(first.articles, page);
    let lastPage = first.lastPage;

    while (!lastPage) {
      page++;
      if (this.pageDelayMs > 0) await sleep(this.pageDelayMs);

      console.log(`  Fetching page ${page}...`);
      const next = await this.api.fetchPage(page);
      add(next.articles, page);
      lastPage = next.lastPage;
    }

    console.log(
      `  → ${articles.length} articles collected (total views: ${first.totalPv}, total likes: ${first.totalLike})`
    );

    return {
      articles,
      pages: page,
      totalPv: first.totalPv,
      totalLike: first.totalLike,
      totalComment: first.totalComment,
    };
  }
}
