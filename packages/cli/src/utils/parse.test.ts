import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { normalizeSymbols, parsePositiveInt, parseTimestamp } from './parse.js';

describe('parse', () => {
  it('should accept positive integers only', () => {
    expect(parsePositiveInt('5')).toBe(5);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow('Must be a positive integer.');
    expect(() => parsePositiveInt('abc')).toThrow(InvalidArgumentError);
  });

  describe('parseTimestamp', () => {
    it('should pass epoch seconds through', () => {
      expect(parseTimestamp('1619654469')).toBe(1619654469);
      expect(parseTimestamp('1618057166.5')).toBe(1618057166.5);
    });

    it('should convert dates to epoch seconds', () => {
      expect(parseTimestamp('2021-03-01')).toBe(1614556800);
      expect(parseTimestamp('2021-04-29T00:00:30Z')).toBe(1619654430);
    });

    it('should reject anything else', () => {
      expect(() => parseTimestamp('yesterday')).toThrow('Not a timestamp or date: yesterday');
    });
  });

  it('should split, trim and upper-case symbols', () => {
    expect(normalizeSymbols(['aapl, tsla', ' gme ', ','])).toEqual(['AAPL', 'TSLA', 'GME']);
  });
});
