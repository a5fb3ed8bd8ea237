import type { QueryParams, Transport } from '../../../types/listing.types';
import { TransientFetchError } from '../../../types/errors';

export interface ItemFixture {
  asin?: string;
  titleParts?: string[];
  image?: string;
  priceText?: string;
  ratingLabel?: string;
  reviewsText?: string;
  /** Extra anchor to the reviews section whose text is the star label */
  starAnchorLabel?: string;
}

export function listingHtml(item: ItemFixture): string {
  const parts = [
    `<div data-component-type="s-search-result" data-asin="${item.asin ?? ''}" class="s-result-item">`,
  ];

  if (item.image) {
    parts.push(`<img class="s-image" src="${item.image}" alt="">`);
  }
  for (const fragment of item.titleParts ?? []) {
    parts.push(`<h2><a href="/item"><span>${fragment}</span></a></h2>`);
  }
  if (item.ratingLabel) {
    parts.push(`<span aria-label="${item.ratingLabel}"><i class="a-icon a-icon-star-small"></i></span>`);
  }
  if (item.starAnchorLabel) {
    parts.push(`<a href="/dp/${item.asin ?? 'x'}#customerReviews"><span>${item.starAnchorLabel}</span></a>`);
  }
  if (item.reviewsText) {
    parts.push(`<a href="/dp/${item.asin ?? 'x'}#customerReviews"><span>${item.reviewsText}</span></a>`);
  }
  if (item.priceText) {
    parts.push(
      `<span class="a-price"><span class="a-offscreen">${item.priceText}</span><span aria-hidden="true">${item.priceText}</span></span>`
    );
  }

  parts.push('</div>');
  return parts.join('\n');
}

/**
 * Pagination bar shaped like the site's: previous/next controls and an ellipsis share the item class
 */
export function paginationHtml(lastPage: number): string {
  const items = [
    '<span class="s-pagination-item s-pagination-previous s-pagination-disabled">Precedente</span>',
    '<span class="s-pagination-item s-pagination-selected">1</span>',
  ];
  if (lastPage >= 2) items.push('<a class="s-pagination-item s-pagination-button" href="/s?k=q&page=2">2</a>');
  if (lastPage >= 4) items.push('<span class="s-pagination-item s-pagination-ellipsis">...</span>');
  if (lastPage >= 3) {
    items.push(`<a class="s-pagination-item s-pagination-button" href="/s?k=q&page=${lastPage}">${lastPage}</a>`);
  }
  items.push('<a class="s-pagination-item s-pagination-next" href="/s?k=q&page=2">Successivo</a>');
  return `<div class="s-pagination-strip">${items.join('')}</div>`;
}

export function searchPageHtml(items: ItemFixture[], options: { lastPage?: number; title?: string } = {}): string {
  return [
    '<!DOCTYPE html>',
    `<html><head><title>${options.title ?? 'Amazon.it : risultati'}</title></head><body>`,
    '<div class="s-main-slot">',
    ...items.map(listingHtml),
    '</div>',
    options.lastPage !== undefined ? paginationHtml(options.lastPage) : '',
    '</body></html>',
  ].join('\n');
}

export function completeItem(asin: string, overrides: Partial<ItemFixture> = {}): ItemFixture {
  return {
    asin,
    titleParts: ['Marca Test', `Prodotto ${asin}`],
    image: `https://images.example.test/${asin}.jpg`,
    priceText: '€1.234,56',
    ratingLabel: '4,3 su 5 stelle',
    reviewsText: '(1.234)',
    ...overrides,
  };
}

/**
 * Serves canned pages by page number. Requests without a page param are page 1.
 * A page mapped to an Error (or missing) rejects as the HTTP transport would after its retries.
 */
export class FakeTransport implements Transport {
  readonly calls: Array<{ url: string; params: QueryParams }> = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly pages: Map<number, string | Error>,
    private readonly latencyMs = 0
  ) {}

  async fetch(url: string, params: QueryParams = {}): Promise<string> {
    this.calls.push({ url, params });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (this.latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
      }

      const page = Number(params.page ?? 1);
      const body = this.pages.get(page);
      if (body === undefined || body instanceof Error) {
        throw new TransientFetchError(`GET ${url} failed after 3 attempt(s): ${body?.message ?? 'not found'}`, {
          url,
          attempts: 3,
          cause: body,
        });
      }
      return body;
    } finally {
      this.inFlight--;
    }
  }

  pagesRequested(): number[] {
    return this.calls.filter((call) => call.params.page !== undefined).map((call) => Number(call.params.page));
  }
}
