/**
 * Site profile: everything specific to the modeled storefront and its locale.
 * Selectors and number formats live here so the extraction code stays site-agnostic.
 */
export interface LocaleRules {
  acceptLanguage: string;
  decimalSeparator: string;
  thousandsSeparator: string;
  /** Full-match pattern of the rating label; group 1 is the score, group 2 the scale */
  ratingLabel: RegExp;
  /** The rating phrase anywhere in a text, e.g. inside a star widget's link */
  ratingPhrase: RegExp;
}

export interface SiteProfile {
  name: string;
  host: string;
  baseUrl: string;
  searchPath: string;
  /** `{id}` is replaced with the item identifier */
  itemPathTemplate: string;
  selectors: {
    container: string;
    /** Cheap substring check for the container marker, used before parsing */
    containerMarker: string;
    idAttribute: string;
    title: string;
    image: string;
    priceContainer: string;
    priceValue: string;
    ratingLabel: string;
    reviewsAnchor: string;
    paginationItem: string;
  };
  locale: LocaleRules;
}

export const AMAZON_IT: SiteProfile = {
  name: 'AmazonIT',
  host: 'amazon.it',
  baseUrl: 'https://www.amazon.it',
  searchPath: '/s',
  itemPathTemplate: '/dp/{id}',
  selectors: {
    container: 'div[data-component-type="s-search-result"]',
    containerMarker: 's-search-result',
    idAttribute: 'data-asin',
    title: 'h2',
    image: 'img.s-image',
    priceContainer: 'span.a-price',
    priceValue: 'span.a-offscreen',
    ratingLabel: 'span[aria-label]',
    reviewsAnchor: 'a[href$="#customerReviews"]',
    paginationItem: '.s-pagination-item',
  },
  locale: {
    acceptLanguage: 'it-IT,it;q=0.8,en-US;q=0.5,en;q=0.3',
    decimalSeparator: ',',
    thousandsSeparator: '.',
    ratingLabel: /^(.+) su (.+) stelle$/,
    ratingPhrase: /\d\S* su \d+ stelle/,
  },
};

export function searchUrl(site: SiteProfile): string {
  return `${site.baseUrl}${site.searchPath}`;
}

export function itemUrl(site: SiteProfile, id: string): string {
  return `${site.baseUrl}${site.itemPathTemplate.replace('{id}', encodeURIComponent(id))}`;
}
