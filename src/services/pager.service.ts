import { load } from 'cheerio';
import { AMAZON_IT, searchUrl, type SiteProfile } from '../config/sites';
import type { Transport } from '../types/listing.types';

/**
 * Highest page number among the pagination indicators, clamped to [1, maxPages].
 * Indicators without a number (previous/next controls, ellipses) are ignored.
 */
export function parsePageCount(html: string, selector: string, maxPages: number): number {
  const $ = load(html);
  const pages = $(selector)
    .toArray()
    .map((el) => $(el).text().trim())
    .filter((text) => /^\d+$/.test(text))
    .map((text) => parseInt(text, 10));

  const reported = pages.length > 0 ? Math.max(...pages) : 1;
  return Math.min(Math.max(reported, 1), maxPages);
}

export interface PagerOptions {
  maxPages: number;
  site?: SiteProfile;
}

/**
 * PagerService
 * Sizes a query by reading the pagination of its first result page
 */
export class PagerService {
  private readonly site: SiteProfile;

  constructor(
    private readonly transport: Transport,
    private readonly options: PagerOptions
  ) {
    if (options.maxPages < 1) {
      throw new Error('maxPages must be at least 1');
    }
    this.site = options.site ?? AMAZON_IT;
  }

  async discoverPageCount(query: string): Promise<number> {
    const html = await this.transport.fetch(searchUrl(this.site), { k: query });
    const count = parsePageCount(html, this.site.selectors.paginationItem, this.options.maxPages);
    console.log(`"${query}": ${count} page(s) to fetch (max ${this.options.maxPages})`);
    return count;
  }
}
