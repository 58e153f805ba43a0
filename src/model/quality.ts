/**
 * Quality value (q parameter) formatting and parsing
 *
 * Qualities are rounded half away from zero to three fractional digits and
 * rendered with one to three fractional digits, so 1 becomes "1.0",
 * 0.08 stays "0.08" and 0.563156454 becomes "0.563".
 */

const QUALITY_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Name of the quality parameter
 */
export const QUALITY_PARAMETER = 'q';

/**
 * Checks that a quality lies within [0, 1]
 */
export function isValidQuality(quality: number): boolean {
  return Number.isFinite(quality) && quality >= 0 && quality <= 1;
}

/**
 * Formats a quality for the q parameter
 *
 * @param quality - Value in [0, 1]; the caller validates the range
 * @returns Decimal text with one to three fractional digits
 */
export function formatQuality(quality: number): string {
  // toFixed(6) absorbs binary representation error before rounding,
  // e.g. 0.0005 * 1000 === 0.49999999999999994
  const milli = Math.round(Number((quality * 1000).toFixed(6)));
  const whole = Math.trunc(milli / 1000);
  const fraction = String(milli % 1000).padStart(3, '0').replace(/0+$/, '');
  return `${whole}.${fraction || '0'}`;
}

/**
 * Reads the numeric value of stored q parameter text
 *
 * @param text - Parameter value as stored
 * @returns The number, or null when the text is not a plain decimal
 */
export function parseQuality(text: string): number | null {
  if (!QUALITY_PATTERN.test(text)) {
    return null;
  }
  return Number(text);
}
