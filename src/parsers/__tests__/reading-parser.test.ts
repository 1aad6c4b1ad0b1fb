/**
 * reading-parser.test.ts
 *
 * Covers:
 *   1. Integers, decimals, signs, exponents, digit separators
 *   2. inf / infinity / nan in any case
 *   3. Rejected forms (words, hex, embedded spaces, misplaced underscores)
 */

import { parseReading } from '../reading-parser.js';

const ACCEPTED: Array<[string, number]> = [
  ['42', 42],
  ['-3.5', -3.5],
  ['+7', 7],
  ['.5', 0.5],
  ['5.', 5],
  ['1e3', 1000],
  ['2.5E-2', 0.025],
  ['1_000', 1000],
  ['0', 0],
];

describe('parseReading', () => {
  it.each(ACCEPTED)('parses %s', (text, expected) => {
    expect(parseReading(text)).toBe(expected);
  });

  it('parses infinities case-insensitively', () => {
    expect(parseReading('inf')).toBe(Infinity);
    expect(parseReading('+Infinity')).toBe(Infinity);
    expect(parseReading('-INF')).toBe(-Infinity);
  });

  it('parses nan', () => {
    expect(parseReading('NaN')).toBeNaN();
    expect(parseReading('-nan')).toBeNaN();
  });

  it.each(['', 'abc', '0x10', '1 2', '_1', '1_', '1__0', '1e', 'e5', '.', '--1', '12abc', 'infinit'])(
    'rejects %p',
    (text) => {
      expect(parseReading(text)).toBeNull();
    },
  );
});
