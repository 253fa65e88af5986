/**
 * Lazy iteration over paginated query and scan results.
 */

import type { WireItem } from '../codec/index.js';
import { MapperError } from '../error/index.js';

/**
 * One page as returned by the store
 */
export interface Page {
  items: WireItem[];
  lastEvaluatedKey?: WireItem;
  scannedCount?: number;
}

/**
 * Fetches the page starting after `exclusiveStartKey`, holding at most
 * `limit` items when given
 */
export type PageFetcher = (exclusiveStartKey: WireItem | undefined, limit: number | undefined) => Promise<Page>;

export interface ResultIteratorOptions {
  /** Maximum number of items yielded in total */
  limit?: number;
  /** Items requested per page; defaults to the remaining limit */
  pageSize?: number;
  /** Resume after this key */
  exclusiveStartKey?: WireItem;
  /** Extracts the resume key of a document, used when iteration stops mid-page */
  keyOf: (document: WireItem) => WireItem;
}

/**
 * Async iterable over decoded items that follows `LastEvaluatedKey` across
 * pages. Pages are fetched only as items are consumed.
 *
 * Iteration is single-use: a second iteration throws.
 *
 * @example
 * ```typescript
 * const results = Thread.query('forum-1', { limit: 10 });
 * for await (const thread of results) {
 *   console.log(thread.subject);
 * }
 * console.log(results.lastEvaluatedKey);
 * ```
 */
export class ResultIterator<T> implements AsyncIterable<T> {
  private started = false;
  private resumeKey?: WireItem;
  private pagesFetched = 0;
  private itemsYielded = 0;
  private itemsScanned = 0;

  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly decode: (document: WireItem) => T,
    private readonly options: ResultIteratorOptions
  ) {
    if (options.limit !== undefined && options.limit < 0) {
      throw new RangeError('limit cannot be negative');
    }
    if (options.pageSize !== undefined && options.pageSize <= 0) {
      throw new RangeError('pageSize must be greater than 0');
    }
    this.resumeKey = options.exclusiveStartKey;
  }

  /**
   * Key to resume from: the store's last evaluated key, or the key of the
   * last item yielded when a limit stopped iteration mid-page. Undefined once
   * every page has been read.
   */
  get lastEvaluatedKey(): WireItem | undefined {
    return this.resumeKey;
  }

  get pageCount(): number {
    return this.pagesFetched;
  }

  get count(): number {
    return this.itemsYielded;
  }

  /** Items the store evaluated, including those a filter dropped */
  get scannedCount(): number {
    return this.itemsScanned;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.started) {
      throw new MapperError({ code: 'IteratorConsumed', message: 'Result iterator has already been iterated' });
    }
    this.started = true;
    return this.iterate();
  }

  /**
   * Collects every remaining item
   */
  async all(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  /**
   * First item, or undefined when there is none
   */
  async first(): Promise<T | undefined> {
    for await (const item of this) {
      return item;
    }
    return undefined;
  }

  private async *iterate(): AsyncGenerator<T, void, undefined> {
    const { limit, pageSize, keyOf } = this.options;
    if (limit === 0) {
      return;
    }

    let hasMore = true;
    while (hasMore) {
      const remaining = limit === undefined ? undefined : limit - this.itemsYielded;
      const requestLimit = pageSize ?? remaining;

      const page = await this.fetchPage(this.resumeKey, requestLimit);
      this.pagesFetched++;
      this.itemsScanned += page.scannedCount ?? page.items.length;
      this.resumeKey = page.lastEvaluatedKey;
      hasMore = page.lastEvaluatedKey !== undefined;

      for (let i = 0; i < page.items.length; i++) {
        const document = page.items[i];
        this.itemsYielded++;
        yield this.decode(document);

        if (limit !== undefined && this.itemsYielded >= limit) {
          if (i < page.items.length - 1 || hasMore) {
            this.resumeKey = keyOf(document);
          }
          return;
        }
      }
    }
  }
}
