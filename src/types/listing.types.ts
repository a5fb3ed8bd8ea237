export interface ListingRecord {
  id?: string;
  title: string;
  link?: string;
  image_url?: string;
  price?: number;
  rating?: number;
  review_count?: number;
}

export interface ListingExtractionResult {
  listings: ListingRecord[];
  metadata: {
    totalExtracted: number;
    containersFound: number;
    recordsSkipped: number;
    source: string;
    extractedAt: Date;
    strategyUsed?: string;
    errors?: string[];
  };
}

/**
 * Output of a single strategy run, before the service wraps it with metadata
 */
export interface StrategyOutput {
  listings: ListingRecord[];
  containersFound: number;
  recordsSkipped: number;
  errors: string[];
}

export interface ExtractionStrategy {
  readonly name: string;
  canHandle(html: string, url: string): boolean;
  extract(html: string, url: string): StrategyOutput;
}

export interface PageFailure {
  page: number;
  message: string;
}

export interface SearchResult {
  query: string;
  listings: ListingRecord[];
  metadata: {
    totalPages: number;
    pagesSucceeded: number;
    failedPages: PageFailure[];
    totalExtracted: number;
    duplicatesDropped: number;
    fromCache: boolean;
    searchedAt: Date;
  };
}

export type QueryParams = Record<string, string | number>;

/**
 * Anything able to GET a URL and hand back the raw body.
 * Implementations retry on their own; a rejection is final.
 */
export interface Transport {
  fetch(url: string, params?: QueryParams): Promise<string>;
}
