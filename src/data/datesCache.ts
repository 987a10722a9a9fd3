/**
 * Keyed JSON document of article timestamps, so detail lookups are only repeated
 * once an entry goes stale.
 */

import { promises as fs } from 'fs';
import { CacheEntry } from '../types';
import { daysBetween } from '../utils/dates';
import { isMissingFile, writeFileAtomic } from './csv';

export const CACHE_STALE_DAYS = 7;

/**
 * An entry is stale when it was never stamped, when its stamp is unreadable, or
 * when it is CACHE_STALE_DAYS or more calendar days old.
 */
export function isStale(entry: CacheEntry, today: string): boolean {
  if (!entry.fetched_at) return true;
  const age = daysBetween(entry.fetched_at, today);
  if (age === undefined) return true;
  return age >= CACHE_STALE_DAYS;
}

function stringField(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Read one stored value. Older caches held the published timestamp as a bare
 * string; those come back with the other fields blank and no fetch stamp.
 */
export function migrateEntry(value: unknown): CacheEntry | undefined {
  if (typeof value === 'string') {
    return { published_at: value, created_at: '', updated_at: '', fetched_at: '' };
  }
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const record = new Map<string, unknown>(Object.entries(value));
    return {
      published_at: stringField(record.get('published_at')),
      created_at: stringField(record.get('created_at')),
      updated_at: stringField(record.get('updated_at')),
      fetched_at: stringField(record.get('fetched_at')),
    };
  }
  return undefined;
}

export class DatesCache {
  private readonly entries: Map<string, CacheEntry>;

  constructor(private readonly filepath: string, entries?: Map<string, CacheEntry>) {
    this.entries = entries ?? new Map();
  }

  /**
   * Load the cache from disk. A missing, unreadable or malformed file yields an
   * empty cache.
   */
  static async load(filepath: string): Promise<DatesCache> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filepath, 'utf-8'));
    } catch (error) {
      if (!isMissingFile(error)) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        console.warn(`⚠️  Could not read ${filepath} (${message}). Rebuilding the cache.`);
      }
      return new DatesCache(filepath);
    }

    if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
      console.warn(`⚠️  ${filepath} is not a keyed document. Rebuilding the cache.`);
      return new DatesCache(filepath);
    }

    const entries = new Map<string, CacheEntry>();
    for (const [key, value] of Object.entries(raw)) {
      const entry = migrateEntry(value);
      if (entry) entries.set(key, entry);
    }
    return new DatesCache(filepath, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  put(key: string, entry: CacheEntry): void {
    this.entries.set(key, entry);
  }

  isStale(entry: CacheEntry, today: string): boolean {
    return isStale(entry, today);
  }

  toJSON(): Record<string, CacheEntry> {
    return Object.fromEntries(this.entries);
  }

  async save(): Promise<void> {
    await writeFileAtomic(this.filepath, JSON.stringify(this.toJSON(), null, 2) + '\n');
  }
}
