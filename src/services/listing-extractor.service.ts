import type { ExtractionStrategy, ListingExtractionResult } from '../types/listing.types';
import { StructuralParseError } from '../types/errors';
import { AmazonItStrategy } from './extraction-strategies/amazon-it.strategy';

/**
 * ListingExtractorService
 * Stateless service that picks a strategy for a result page and extracts its listings
 */
export class ListingExtractorService {
  private strategies: ExtractionStrategy[] = [];

  constructor(strategies: ExtractionStrategy[] = [new AmazonItStrategy()]) {
    strategies.forEach((strategy) => this.registerStrategy(strategy));
  }

  /**
   * Register a new extraction strategy
   */
  registerStrategy(strategy: ExtractionStrategy): void {
    this.strategies.push(strategy);
  }

  /**
   * Extract listings from one page of markup.
   * Never throws for page content: an unrecognised page yields an empty result.
   */
  extract(html: string, url: string): ListingExtractionResult {
    const strategy = this.findStrategy(html, url);

    if (!strategy) {
      const error = new StructuralParseError('No extraction strategy recognises this page', url);
      console.warn(`⚠️  ${error.message}: ${url}`);
      return {
        listings: [],
        metadata: {
          totalExtracted: 0,
          containersFound: 0,
          recordsSkipped: 0,
          source: url,
          extractedAt: new Date(),
          errors: [error.message],
        },
      };
    }

    const output = strategy.extract(html, url);

    return {
      listings: output.listings,
      metadata: {
        totalExtracted: output.listings.length,
        containersFound: output.containersFound,
        recordsSkipped: output.recordsSkipped,
        source: url,
        extractedAt: new Date(),
        strategyUsed: strategy.name,
        ...(output.errors.length > 0 && { errors: output.errors }),
      },
    };
  }

  private findStrategy(html: string, url: string): ExtractionStrategy | undefined {
    return this.strategies.find((strategy) => strategy.canHandle(html, url));
  }

  /**
   * Get list of registered strategy names
   */
  getRegisteredStrategies(): string[] {
    return this.strategies.map((s) => s.name);
  }
}
