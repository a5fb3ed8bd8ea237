import type { ListingRecord } from '../types/listing.types';

export interface PriceBounds {
  min: number;
  max: number;
}

type PricedListing = ListingRecord & { price: number };

function hasPrice(listing: ListingRecord): listing is PricedListing {
  return listing.price !== undefined;
}

/**
 * Lowest and highest price among the listings that have one
 */
export function priceBounds(listings: ListingRecord[]): PriceBounds | undefined {
  const prices = listings.filter(hasPrice).map((listing) => listing.price);
  if (prices.length === 0) return undefined;
  return { min: Math.min(...prices), max: Math.max(...prices) };
}

/**
 * Listings priced within [min, max], inclusive. Unpriced listings are left out.
 */
export function filterByPriceRange(listings: ListingRecord[], range: PriceBounds): PricedListing[] {
  return listings.filter(hasPrice).filter((listing) => listing.price >= range.min && listing.price <= range.max);
}
