import { CONFIG, type SearchSettings, type TransportSettings } from './config';
import { AMAZON_IT, type SiteProfile } from './config/sites';
import { HttpTransport } from './services/http-transport.service';
import { SearchService } from './services/search.service';
import type { ListingRecord, SearchResult, Transport } from './types';

export interface SearchClientOverrides {
  search?: Partial<SearchSettings>;
  transport?: Partial<TransportSettings>;
  site?: SiteProfile;
  /** Replaces the HTTP transport entirely, e.g. with a fake in tests */
  transportImpl?: Transport;
}

export interface SearchClient {
  discoverPageCount(query: string): Promise<number>;
  runSearch(query: string): Promise<ListingRecord[]>;
  search(query: string): Promise<SearchResult>;
}

/**
 * Wire a search client from CONFIG plus any overrides
 */
export function createSearchClient(overrides: SearchClientOverrides = {}): SearchClient {
  const site = overrides.site ?? AMAZON_IT;
  const transport =
    overrides.transportImpl ??
    new HttpTransport({
      ...CONFIG.transport,
      ...overrides.transport,
      acceptLanguage: site.locale.acceptLanguage,
    });

  const service = new SearchService(transport, {
    ...CONFIG.search,
    ...overrides.search,
    site,
  });

  return {
    discoverPageCount: (query) => service.discoverPageCount(query),
    runSearch: (query) => service.runSearch(query),
    search: (query) => service.search(query),
  };
}

export { CONFIG, loadConfig } from './config';
export type { Config, FailurePolicy, SearchSettings, TransportSettings } from './config';
export { AMAZON_IT, itemUrl, searchUrl } from './config/sites';
export type { LocaleRules, SiteProfile } from './config/sites';
export { HttpTransport, visibleText } from './services/http-transport.service';
export { UserAgentPool, DEFAULT_USER_AGENTS } from './services/user-agent-pool';
export { PagerService, parsePageCount } from './services/pager.service';
export { ListingExtractorService } from './services/listing-extractor.service';
export { AmazonItStrategy } from './services/extraction-strategies/amazon-it.strategy';
export { parsePrice, parseRating, parseReviewCount } from './services/extraction-strategies/base.strategy';
export { SearchService } from './services/search.service';
export { SearchCache } from './services/search-cache';
export { filterByPriceRange, priceBounds } from './utils/listing-filters';
export type { PriceBounds } from './utils/listing-filters';
export * from './types';
