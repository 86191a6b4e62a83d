/**
 * Pagination and Batching Helpers
 *
 * @module sources/paging
 */

import type { OffsetPage, OffsetPageRequest, TokenPage } from './types.js';

/**
 * Split items into consecutive batches of at most `size` items.
 *
 * @example
 * ```typescript
 * chunk(['a', 'b', 'c'], 2); // [['a', 'b'], ['c']]
 * ```
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error('Batch size must be a positive integer');
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Page through an offset-paginated listing until it is exhausted.
 *
 * Stops when a page reports no successor or comes back empty.
 */
export async function collectOffsetPages<T>(
  fetchPage: (page: OffsetPageRequest) => Promise<OffsetPage<T>>,
  limit: number
): Promise<T[]> {
  const out: T[] = [];
  let offset = 0;

  while (true) {
    const page = await fetchPage({ limit, offset });
    out.push(...page.items);
    if (!page.hasNext || page.items.length === 0) break;
    offset += limit;
  }

  return out;
}

/**
 * Page through a token-paginated listing until no next token is returned.
 */
export async function collectTokenPages<T>(
  fetchPage: (pageToken?: string) => Promise<TokenPage<T>>
): Promise<T[]> {
  const out: T[] = [];
  const seen = new Set<string>();
  let pageToken: string | undefined;

  do {
    const page = await fetchPage(pageToken);
    out.push(...page.items);
    pageToken = page.nextPageToken;
    // A repeated token would loop forever
    if (pageToken !== undefined) {
      if (seen.has(pageToken)) break;
      seen.add(pageToken);
    }
  } while (pageToken);

  return out;
}

/**
 * Keep the first item for each key, preserving order.
 */
export function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of items) {
    const k = key(item);
    if (!seen.has(k)) {
      seen.add(k);
      out.push(item);
    }
  }
  return out;
}
