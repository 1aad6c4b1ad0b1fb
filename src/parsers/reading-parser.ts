/**
 * reading-parser.ts
 * Parse one trimmed line of the numeric input file.
 *
 * Accepted forms:
 *   42   -3.5   .5   5.   +1e3   2.5E-2   1_000
 *   inf  -Infinity  nan   (case-insensitive)
 *
 * Rejected: empty text, hexadecimal/octal/binary literals, embedded
 * whitespace, leading/trailing/doubled underscores.
 */

const DIGITS = String.raw`\d(?:_?\d)*`;

const DECIMAL_RE = new RegExp(
  String.raw`^[+-]?(?:${DIGITS}(?:\.(?:${DIGITS})?)?|\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`,
);

const SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse a reading. Returns null when the text is not a number.
 */
export function parseReading(text: string): number | null {
  if (DECIMAL_RE.test(text)) {
    return Number(text.replace(/_/g, ''));
  }

  const special = SPECIAL_RE.exec(text);
  if (special !== null) {
    const [, sign, word] = special;
    if (word?.toLowerCase() === 'nan') return NaN;
    return sign === '-' ? -Infinity : Infinity;
  }

  return null;
}
