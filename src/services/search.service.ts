import pLimit from 'p-limit';
import type { SearchSettings } from '../config';
import { AMAZON_IT, searchUrl, type SiteProfile } from '../config/sites';
import type { ListingRecord, PageFailure, SearchResult, Transport } from '../types/listing.types';
import { InvalidQueryError, SearchAbortedError } from '../types/errors';
import { AmazonItStrategy } from './extraction-strategies/amazon-it.strategy';
import { ListingExtractorService } from './listing-extractor.service';
import { PagerService } from './pager.service';
import { SearchCache } from './search-cache';

export interface SearchServiceOptions extends SearchSettings {
  site?: SiteProfile;
  extractor?: ListingExtractorService;
}

type PageOutcome =
  | { ok: true; page: number; listings: ListingRecord[] }
  | { ok: false; page: number; error: unknown };

// Callers get their own arrays and records; the cached result is never handed out
function copyResult(result: SearchResult, fromCache: boolean): SearchResult {
  return {
    ...result,
    listings: result.listings.map((listing) => ({ ...listing })),
    metadata: {
      ...result.metadata,
      failedPages: result.metadata.failedPages.map((failure) => ({ ...failure })),
      fromCache,
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SearchService
 * Sizes a query, fetches and extracts every result page on a bounded pool,
 * and merges the pages into one result set.
 */
export class SearchService {
  private readonly site: SiteProfile;
  private readonly pager: PagerService;
  private readonly extractor: ListingExtractorService;
  private readonly cache: SearchCache<SearchResult>;

  constructor(
    private readonly transport: Transport,
    private readonly options: SearchServiceOptions
  ) {
    if (options.concurrency < 1) {
      throw new Error('concurrency must be at least 1');
    }
    this.site = options.site ?? AMAZON_IT;
    this.pager = new PagerService(transport, { maxPages: options.maxPages, site: this.site });
    this.extractor = options.extractor ?? new ListingExtractorService([new AmazonItStrategy(this.site)]);
    this.cache = new SearchCache<SearchResult>({
      ttlMs: options.cacheTtlMs,
      // A partial result would freeze the gap until expiry
      shouldRetain: (result) => result.metadata.failedPages.length === 0,
    });
  }

  async discoverPageCount(query: string): Promise<number> {
    this.assertQuery(query);
    return this.pager.discoverPageCount(query);
  }

  async runSearch(query: string): Promise<ListingRecord[]> {
    const result = await this.search(query);
    return result.listings;
  }

  async search(query: string): Promise<SearchResult> {
    this.assertQuery(query);

    const { value, hit } = this.cache.getOrCreate(query, () => this.execute(query));
    const result = await value;
    if (hit) {
      console.log(`"${query}": ${result.listings.length} listings served from cache`);
    }
    return copyResult(result, hit);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private assertQuery(query: string): void {
    if (query.trim().length === 0) {
      throw new InvalidQueryError(query);
    }
  }

  private async execute(query: string): Promise<SearchResult> {
    const totalPages = await this.pager.discoverPageCount(query);
    const limit = pLimit(this.options.concurrency);

    const pages = Array.from({ length: totalPages }, (_, i) => i + 1);
    const outcomes = await Promise.all(
      pages.map((page) =>
        limit(async () => {
          const outcome = await this.fetchPage(query, page, totalPages);
          if (!outcome.ok && this.options.failurePolicy === 'strict') {
            limit.clearQueue();
            throw new SearchAbortedError(query, page, outcome.error);
          }
          return outcome;
        })
      )
    );

    const failedPages: PageFailure[] = [];
    const listings: ListingRecord[] = [];
    const seen = new Set<string>();
    let duplicatesDropped = 0;

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        failedPages.push({ page: outcome.page, message: errorMessage(outcome.error) });
        continue;
      }
      for (const listing of outcome.listings) {
        if (listing.id !== undefined) {
          if (seen.has(listing.id)) {
            duplicatesDropped++;
            continue;
          }
          seen.add(listing.id);
        }
        listings.push(listing);
      }
    }

    if (failedPages.length > 0) {
      console.warn(
        `⚠️  "${query}": returning partial results, page(s) ${failedPages.map((f) => f.page).join(', ')} failed`
      );
    }
    console.log(`✅ "${query}": ${listings.length} listings from ${totalPages - failedPages.length}/${totalPages} pages`);

    return {
      query,
      listings,
      metadata: {
        totalPages,
        pagesSucceeded: totalPages - failedPages.length,
        failedPages,
        totalExtracted: listings.length,
        duplicatesDropped,
        fromCache: false,
        searchedAt: new Date(),
      },
    };
  }

  private async fetchPage(query: string, page: number, totalPages: number): Promise<PageOutcome> {
    const url = new URL(searchUrl(this.site));
    url.searchParams.set('k', query);
    url.searchParams.set('page', String(page));

    try {
      const html = await this.transport.fetch(searchUrl(this.site), { k: query, page });
      const { listings } = this.extractor.extract(html, url.toString());
      console.log(`Page ${page}/${totalPages}: ${listings.length} listings`);
      return { ok: true, page, listings };
    } catch (error) {
      console.error(`Page ${page}/${totalPages} of "${query}" failed: ${errorMessage(error)}`);
      return { ok: false, page, error };
    }
  }
}
