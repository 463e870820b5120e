import type { CacheEntry } from '../../common/types.js';
import { FetchError, describeError } from '../../common/errors.js';
import { moduleLogger } from '../../common/logger.js';
import type { DocumentCacheStore } from './document-cache.store.js';

/** Performs the external fetch; resolves the document body. */
export type DocumentFetcher = (url: string) => Promise<string>;

export interface DocumentCacheOptions {
  /** Entries older than this are fetched again. Unset means entries never expire. */
  maxAgeMs?: number;
  now?: () => Date;
}

const log = moduleLogger('cache');

/**
 * URL-keyed cache of reference documents. Concurrent callers for the same URL
 * share one in-flight request, and resolved entries are remembered in process
 * so an unreachable backing store never causes a second fetch.
 */
export class DocumentCache {
  private readonly resolved = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<CacheEntry>>();
  private readonly now: () => Date;
  private externalFetches = 0;

  constructor(
    private readonly store: DocumentCacheStore,
    private readonly fetcher: DocumentFetcher,
    private readonly options: DocumentCacheOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Number of fetcher invocations made by this cache. */
  get fetchCount(): number {
    return this.externalFetches;
  }

  getOrFetch(url: string): Promise<CacheEntry> {
    const local = this.resolved.get(url);
    if (local && this.isFresh(local)) {
      return Promise.resolve(local);
    }
    const pending = this.inFlight.get(url);
    if (pending) {
      return pending;
    }
    const request = this.resolve(url).finally(() => {
      this.inFlight.delete(url);
    });
    this.inFlight.set(url, request);
    return request;
  }

  async invalidate(url: string): Promise<void> {
    this.resolved.delete(url);
    try {
      await this.store.delete(url);
    } catch (error) {
      log.warn({ url, store: this.store.kind, err: describeError(error) }, 'cache store delete failed');
    }
  }

  private isFresh(entry: CacheEntry): boolean {
    if (this.options.maxAgeMs === undefined) {
      return true;
    }
    const fetchedAt = Date.parse(entry.fetchedAt);
    return Number.isFinite(fetchedAt) && this.now().getTime() - fetchedAt <= this.options.maxAgeMs;
  }

  private async resolve(url: string): Promise<CacheEntry> {
    const stored = await this.readStore(url);
    if (stored && this.isFresh(stored)) {
      this.resolved.set(url, stored);
      return stored;
    }

    this.externalFetches += 1;
    let content: string;
    try {
      content = await this.fetcher(url);
    } catch (error) {
      log.warn({ url, err: describeError(error) }, 'document fetch failed');
      throw error instanceof FetchError ? error : new FetchError(url, error);
    }

    const entry: CacheEntry = { url, content, fetchedAt: this.now().toISOString() };
    this.resolved.set(url, entry);
    try {
      await this.store.put(entry);
    } catch (error) {
      log.warn({ url, store: this.store.kind, err: describeError(error) }, 'cache store write failed');
    }
    return entry;
  }

  private async readStore(url: string): Promise<CacheEntry | undefined> {
    try {
      return await this.store.get(url);
    } catch (error) {
      log.warn({ url, store: this.store.kind, err: describeError(error) }, 'cache store read failed');
      return undefined;
    }
  }
}
