import { describe, test, expect } from 'vitest';
import { AMAZON_IT } from '../../config/sites';
import { FieldParseError } from '../../types/errors';
import { parsePrice, parseRating, parseReviewCount } from '../extraction-strategies/base.strategy';

const locale = AMAZON_IT.locale;

describe('field parsers', () => {
  describe('parsePrice', () => {
    test('parses prices with thousands separator and decimal comma', () => {
      expect(parsePrice('€1.234,56', locale)).toBe(1234.56);
    });

    test('parses prices with a trailing currency symbol', () => {
      expect(parsePrice('19,99 €', locale)).toBe(19.99);
      expect(parsePrice('19,99\u00a0€', locale)).toBe(19.99);
    });

    test('parses whole amounts', () => {
      expect(parsePrice('€12', locale)).toBe(12);
      expect(parsePrice('€1.000', locale)).toBe(1000);
    });

    test('rejects text without an amount', () => {
      expect(() => parsePrice('Non disponibile', locale)).toThrow(FieldParseError);
      expect(() => parsePrice('', locale)).toThrow('Could not parse price from ""');
    });

    test('rejects a range of two amounts', () => {
      expect(() => parsePrice('10,99 € - 20,99 €', locale)).toThrow(FieldParseError);
    });
  });

  describe('parseRating', () => {
    test('parses the Italian star label', () => {
      expect(parseRating('4,3 su 5 stelle', locale)).toBe(4.3);
      expect(parseRating('5 su 5 stelle', locale)).toBe(5);
      expect(parseRating(' 3,0 su 5 stelle ', locale)).toBe(3);
    });

    test('ignores labels that are not ratings', () => {
      expect(parseRating('Aggiungi al carrello', locale)).toBeUndefined();
      expect(parseRating('4,3 out of 5 stars', locale)).toBeUndefined();
    });

    test('rejects unparsable or out-of-range scores', () => {
      expect(() => parseRating('molto su 5 stelle', locale)).toThrow(FieldParseError);
      expect(() => parseRating('7 su 10 stelle', locale)).toThrow('out of range 0-5');
    });
  });

  describe('parseReviewCount', () => {
    test('strips punctuation and thousands separators', () => {
      expect(parseReviewCount('(1.234)')).toBe(1234);
      expect(parseReviewCount('87')).toBe(87);
      expect(parseReviewCount('0')).toBe(0);
    });

    test('leaves the count absent when there are no digits', () => {
      expect(parseReviewCount('Recensioni')).toBeUndefined();
      expect(parseReviewCount('')).toBeUndefined();
    });
  });
});
