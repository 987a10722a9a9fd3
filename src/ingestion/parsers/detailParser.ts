/**
 * Parser for the article detail payload
 * Finds timestamp fields whose names and nesting vary between API versions
 */

import { DetailFields } from '../../types';

/** Accepted source names per target field, in order of preference */
export const DETAIL_FIELD_CANDIDATES = {
  publishedAt: ['published_at', 'publish_at', 'first_published_at'],
  createdAt: ['created_at'],
  updatedAt: ['updated_at'],
} as const satisfies Record<keyof DetailFields, readonly string[]>;

type DetailField = keyof typeof DETAIL_FIELD_CANDIDATES;

const DETAIL_FIELDS: DetailField[] = ['publishedAt', 'createdAt', 'updatedAt'];

// The embedded author profile carries its own created_at/updated_at
const EXCLUDED_KEYS = new Set(['user']);

const MAX_DEPTH = 4;

const CANDIDATE_NAMES = new Set<string>(DETAIL_FIELDS.flatMap((field): string[] => [...DETAIL_FIELD_CANDIDATES[field]]));

/**
 * Level-by-level search of a detail payload for the timestamp fields.
 * A field is taken from the shallowest level holding any of its candidate
 * names; within that level, the candidate order decides. Empty strings count
 * as absent.
 */
export function extractDetailFields(tree: unknown): DetailFields {
  const fields: DetailFields = {};
  let level: unknown[] = [tree];

  for (let depth = 0; level.length > 0 && depth <= MAX_DEPTH; depth++) {
    const found = new Map<string, string>();
    const nextLevel: unknown[] = [];

    for (const node of level) {
      if (Array.isArray(node)) {
        nextLevel.push(...node);
        continue;
      }
      if (!node || typeof node !== 'object') continue;

      for (const [key, value] of Object.entries(node)) {
        if (EXCLUDED_KEYS.has(key)) continue;

        if (CANDIDATE_NAMES.has(key) && typeof value === 'string' && value.trim()) {
          if (!found.has(key)) found.set(key, value.trim());
        } else if (value && typeof value === 'object') {
          nextLevel.push(value);
        }
      }
    }

    for (const field of DETAIL_FIELDS) {
      if (fields[field]) continue;
      const candidates: readonly string[] = DETAIL_FIELD_CANDIDATES[field];
      const name = candidates.find((candidate) => found.has(candidate));
      const value = name ? found.get(name) : undefined;
      if (value) fields[field] = value;
    }

    if (DETAIL_FIELDS.every((field) => fields[field])) break;
    level = nextLevel;
  }

  return fields;
}

export function hasAnyField(fields: DetailFields): boolean {
  return Boolean(fields.publishedAt || fields.createdAt || fields.updatedAt);
}
