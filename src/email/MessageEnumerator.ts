import { EnumerationError } from '../errors/RetentionErrors.js';
import { MailProvider } from '../provider/MailProvider.js';
import { SearchPage } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface EnumerateOptions {
  /** Results requested per page; must be positive. */
  pageSize: number;
  /** Stop after this many pages; 0 keeps going until the provider runs out. */
  maxPages?: number;
  signal?: AbortSignal;
}

/**
 * Walks the provider's paginated search for one predicate and yields message
 * ids in provider order, each id at most once.
 */
export class MessageEnumerator {
  constructor(private readonly provider: MailProvider) {}

  /**
   * Lazily fetch pages. Each yielded array holds the ids of that page not
   * seen on an earlier page.
   *
   * @throws EnumerationError when a page request fails; it carries the
   * failing page index and the ids gathered so far
   */
  async *pages(predicate: string, options: EnumerateOptions): AsyncGenerator<string[]> {
    const { pageSize, maxPages = 0, signal } = options;
    if (!Number.isSafeInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }
    if (!Number.isSafeInteger(maxPages) || maxPages < 0) {
      throw new RangeError(`maxPages must be zero or a positive integer, got ${maxPages}`);
    }

    const seen = new Set<string>();
    const gathered: string[] = [];
    let pageToken: string | undefined;
    let pageIndex = 0;

    do {
      signal?.throwIfAborted();

      let page: SearchPage;
      try {
        page = await this.provider.searchMessages(predicate, pageToken, pageSize);
      } catch (error) {
        throw new EnumerationError({
          predicate,
          pageIndex,
          partialIds: [...gathered],
          cause: error,
        });
      }

      const fresh: string[] = [];
      for (const id of page.ids) {
        if (!seen.has(id)) {
          seen.add(id);
          fresh.push(id);
        }
      }
      if (fresh.length !== page.ids.length) {
        logger.debug('Dropped duplicate ids across page boundary', {
          pageIndex,
          duplicates: page.ids.length - fresh.length,
        });
      }
      gathered.push(...fresh);
      pageIndex++;
      pageToken = page.nextPageToken || undefined;

      yield fresh;
    } while (pageToken !== undefined && (maxPages === 0 || pageIndex < maxPages));

    logger.debug('Enumeration finished', { predicate, pages: pageIndex, total: gathered.length });
  }

  /** Collect every id the predicate matches, in order and deduplicated. */
  async enumerate(predicate: string, options: EnumerateOptions): Promise<string[]> {
    const ids: string[] = [];
    for await (const page of this.pages(predicate, options)) {
      ids.push(...page);
    }
    return ids;
  }
}
