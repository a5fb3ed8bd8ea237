import type { LocaleRules } from '../../config/sites';
import type { StrategyOutput } from '../../types/listing.types';
import { FieldParseError } from '../../types/errors';

const LOCALE_NUMBER = /^\d+(?:\.\d+)?$/;
const MAX_RATING = 5;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Convert a locale-formatted number ("1.234,56") to a JS number.
 * Returns undefined when the text does not hold a plain decimal.
 */
function toNumber(text: string, locale: LocaleRules): number | undefined {
  const normalized = text
    .split(locale.thousandsSeparator)
    .join('')
    .replace(locale.decimalSeparator, '.');
  return LOCALE_NUMBER.test(normalized) ? Number(normalized) : undefined;
}

/**
 * Parse a displayed price such as "€1.234,56" or "19,99 €".
 * Currency symbols and spacing are dropped before the locale separators are applied.
 */
export function parsePrice(text: string, locale: LocaleRules): number {
  const raw = text.trim();
  const allowed = new RegExp(
    `[^\\d${escapeRegExp(locale.decimalSeparator)}${escapeRegExp(locale.thousandsSeparator)}]`,
    'g'
  );
  const value = toNumber(raw.replace(allowed, ''), locale);
  if (value === undefined) {
    throw new FieldParseError('price', raw);
  }
  return value;
}

/**
 * Parse an accessibility label such as "4,3 su 5 stelle".
 * Labels that do not look like a rating at all yield undefined.
 */
export function parseRating(label: string, locale: LocaleRules): number | undefined {
  const raw = label.trim();
  const match = locale.ratingLabel.exec(raw);
  if (!match) return undefined;

  const score = toNumber(match[1].trim(), locale);
  const scale = toNumber(match[2].trim(), locale);
  if (score === undefined || scale === undefined) {
    throw new FieldParseError('rating', raw);
  }
  if (score > MAX_RATING || score > scale) {
    throw new FieldParseError('rating', raw, `out of range 0-${MAX_RATING}`);
  }
  return score;
}

/**
 * "(1.234)" -> 1234. Text without digits yields undefined, never zero.
 */
export function parseReviewCount(text: string): number | undefined {
  const digits = text.replace(/\D/g, '');
  return digits ? parseInt(digits, 10) : undefined;
}

/**
 * BaseExtractionStrategy
 * Field isolation shared by every HTML strategy
 */
export abstract class BaseExtractionStrategy {
  /**
   * Run one field reader. A FieldParseError leaves the field absent and is
   * recorded; anything else is a record-level failure and propagates.
   */
  protected readField<T>(errors: string[], read: () => T | undefined): T | undefined {
    try {
      return read();
    } catch (error) {
      if (error instanceof FieldParseError) {
        errors.push(error.message);
        return undefined;
      }
      throw error;
    }
  }

  protected emptyOutput(errors: string[] = []): StrategyOutput {
    return { listings: [], containersFound: 0, recordsSkipped: 0, errors };
  }

  protected matchesHost(url: string, host: string): boolean {
    try {
      const hostname = new URL(url).hostname.replace(/^www\./, '');
      return hostname === host || hostname.endsWith(`.${host}`);
    } catch {
      return false;
    }
  }
}
