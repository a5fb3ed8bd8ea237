import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { AMAZON_IT, itemUrl, type SiteProfile } from '../../config/sites';
import type { ExtractionStrategy, ListingRecord, StrategyOutput } from '../../types/listing.types';
import { RecordParseError, StructuralParseError } from '../../types/errors';
import { BaseExtractionStrategy, parsePrice, parseRating, parseReviewCount } from './base.strategy';

/**
 * AmazonItStrategy
 * Extracts search-result listings from Amazon Italy result pages.
 * Works for any storefront that shares the profile's markup; pass another SiteProfile to reuse it.
 */
export class AmazonItStrategy extends BaseExtractionStrategy implements ExtractionStrategy {
  readonly name: string;

  constructor(protected readonly site: SiteProfile = AMAZON_IT) {
    super();
    this.name = site.name;
  }

  canHandle(html: string, url: string): boolean {
    return this.matchesHost(url, this.site.host) || html.includes(this.site.selectors.containerMarker);
  }

  extract(html: string, url: string): StrategyOutput {
    const $ = load(html);
    const containers = $<Element, string>(this.site.selectors.container);

    if (containers.length === 0) {
      const error = new StructuralParseError(
        `No listing containers matching ${this.site.selectors.container}`,
        url
      );
      console.warn(`⚠️  ${this.name}: ${error.message} at ${url} (page title: "${$('title').text().trim()}")`);
      return this.emptyOutput([error.message]);
    }

    const listings: ListingRecord[] = [];
    const errors: string[] = [];
    let recordsSkipped = 0;

    containers.each((index, element) => {
      const $card = $(element);
      try {
        listings.push(this.extractRecord($, $card, errors));
      } catch (error) {
        const failure = new RecordParseError(index, $.html($card), error);
        console.error(`${this.name}: ${failure.message}\n${failure.containerHtml}`);
        errors.push(failure.message);
        recordsSkipped++;
      }
    });

    return {
      listings,
      containersFound: containers.length,
      recordsSkipped,
      errors,
    };
  }

  protected extractRecord($: CheerioAPI, $card: Cheerio<Element>, errors: string[]): ListingRecord {
    const id = this.readId($card);
    const title = this.readTitle($, $card);

    const record: ListingRecord = id ? { id, title, link: itemUrl(this.site, id) } : { title };

    const imageUrl = this.readField(errors, () => this.readImage($card));
    if (imageUrl !== undefined) record.image_url = imageUrl;

    const price = this.readField(errors, () => this.readPrice($card));
    if (price !== undefined) record.price = price;

    const rating = this.readField(errors, () => this.readRating($, $card));
    if (rating !== undefined) record.rating = rating;

    const reviewCount = this.readField(errors, () => this.readReviewCount($, $card));
    if (reviewCount !== undefined) record.review_count = reviewCount;

    return record;
  }

  protected readId($card: Cheerio<Element>): string | undefined {
    const id = $card.attr(this.site.selectors.idAttribute)?.trim();
    return id || undefined;
  }

  protected readTitle($: CheerioAPI, $card: Cheerio<Element>): string {
    return $card
      .find(this.site.selectors.title)
      .map((_, heading) => $(heading).text().trim())
      .get()
      .filter((fragment) => fragment.length > 0)
      .join(': ');
  }

  protected readImage($card: Cheerio<Element>): string | undefined {
    const src = $card.find(this.site.selectors.image).first().attr('src')?.trim();
    return src || undefined;
  }

  protected readPrice($card: Cheerio<Element>): number | undefined {
    const { priceContainer, priceValue } = this.site.selectors;
    const value = $card.find(priceContainer).first().find(priceValue).first();
    if (value.length === 0) return undefined;
    return parsePrice(value.text(), this.site.locale);
  }

  protected readRating($: CheerioAPI, $card: Cheerio<Element>): number | undefined {
    const { ratingLabel } = this.site.locale;
    const label = $card
      .find(this.site.selectors.ratingLabel)
      .toArray()
      .map((el) => ($(el).attr('aria-label') ?? '').trim())
      .find((text) => ratingLabel.test(text));

    return label === undefined ? undefined : parseRating(label, this.site.locale);
  }

  protected readReviewCount($: CheerioAPI, $card: Cheerio<Element>): number | undefined {
    const { ratingPhrase } = this.site.locale;
    // The star widget can link to the same anchor; its text holds the rating, not the count
    const text = $card
      .find(this.site.selectors.reviewsAnchor)
      .toArray()
      .map((el) => $(el).text().trim())
      .find((anchorText) => !ratingPhrase.test(anchorText));

    return text === undefined ? undefined : parseReviewCount(text);
  }
}
