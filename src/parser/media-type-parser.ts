/**
 * Media-Type Value Parser
 *
 * Parses one media-type value (`type/subtype; name=value; ...`) from
 * header text. Leading whitespace and obsolete line folds are skipped;
 * whitespace is tolerated around `/`, `;` and `=`. The single-value entry
 * points require the whole input to be consumed, so a trailing comma or a
 * second list item is an error.
 *
 * @packageDocumentation
 */

import { MediaTypeHeaderValue } from '../model/media-type.js';
import { NameValueHeaderValue } from '../model/parameter.js';
import { QUALITY_PARAMETER, isValidQuality, parseQuality } from '../model/quality.js';
import { resolveParserOptions, type ParserOptions } from '../types/config.js';
import { MediaTypeFormatError } from '../types/errors.js';
import { getQuotedStringLength, getTokenLength, getWhitespaceLength } from './scanner.js';

/**
 * Outcome of a non-throwing parse
 */
export type TryParseResult =
  | { success: true; value: MediaTypeHeaderValue }
  | { success: false; value: null };

/**
 * Thrown internally when the grammar is violated
 */
function fail(input: string, position: number, reason: string): never {
  throw new MediaTypeFormatError(`Invalid media type "${input}": ${reason} at position ${position}`, input, position);
}

/**
 * Checks that a q parameter carries a decimal number within [0, 1]
 */
function checkQualityParameter(input: string, position: number, value: string | null): void {
  const quality = value === null ? null : parseQuality(value);
  if (quality === null || !isValidQuality(quality)) {
    fail(input, position, 'invalid quality value');
  }
}

/**
 * Parses a single `name [= value]` parameter
 *
 * @returns The parameter and the position after it (trailing whitespace included)
 */
function parseParameter(input: string, startPos: number): { parameter: NameValueHeaderValue; pos: number } {
  let pos = startPos;

  const nameLength = getTokenLength(input, pos);
  if (nameLength === 0) {
    fail(input, pos, 'expected parameter name');
  }
  const name = input.slice(pos, pos + nameLength);
  pos += nameLength;
  pos += getWhitespaceLength(input, pos);

  let value: string | null = null;

  if (input[pos] === '=') {
    pos++;
    pos += getWhitespaceLength(input, pos);

    let valueLength: number;
    if (input[pos] === '"') {
      valueLength = getQuotedStringLength(input, pos);
      if (valueLength === 0) {
        fail(input, pos, 'invalid quoted string');
      }
    } else {
      // An empty value ("name=") is permitted
      valueLength = getTokenLength(input, pos);
    }

    value = input.slice(pos, pos + valueLength);
    pos += valueLength;
    pos += getWhitespaceLength(input, pos);
  }

  if (name.toLowerCase() === QUALITY_PARAMETER) {
    checkQualityParameter(input, startPos, value);
  }

  return { parameter: new NameValueHeaderValue(name, value), pos };
}

/**
 * Parses one media-type value starting at `startPos`. Stops before the first
 * character that cannot continue the value (typically a comma or the end of
 * input).
 *
 * @param input - Header text
 * @param startPos - Position to start at
 * @returns The parsed value and the number of characters consumed
 * @throws MediaTypeFormatError on malformed input
 */
export function parseMediaTypeAt(input: string, startPos: number): { value: MediaTypeHeaderValue; length: number } {
  let pos = startPos + getWhitespaceLength(input, startPos);

  const typeLength = getTokenLength(input, pos);
  if (typeLength === 0) {
    fail(input, pos, 'expected type');
  }
  const type = input.slice(pos, pos + typeLength);
  pos += typeLength;
  pos += getWhitespaceLength(input, pos);

  if (input[pos] !== '/') {
    fail(input, pos, "expected '/'");
  }
  pos++;
  pos += getWhitespaceLength(input, pos);

  const subtypeLength = getTokenLength(input, pos);
  if (subtypeLength === 0) {
    fail(input, pos, 'expected subtype');
  }
  const subtype = input.slice(pos, pos + subtypeLength);
  pos += subtypeLength;
  pos += getWhitespaceLength(input, pos);

  const value = new MediaTypeHeaderValue(`${type}/${subtype}`);

  while (input[pos] === ';') {
    pos++;
    pos += getWhitespaceLength(input, pos);

    // A trailing ';' ends the value
    if (pos >= input.length || input[pos] === ',') {
      break;
    }

    const result = parseParameter(input, pos);
    value.parameters.add(result.parameter);
    pos = result.pos;
  }

  return { value, length: pos - startPos };
}

/**
 * Parses a single media-type header value
 *
 * @param input - Header text, e.g. "text/plain; charset=utf-8"
 * @returns The parsed value
 * @throws MediaTypeFormatError if the input is empty, malformed, or has
 *   anything after the value
 */
export function parseMediaType(input: string | null | undefined): MediaTypeHeaderValue {
  if (input === null || input === undefined || input.length === 0) {
    throw new MediaTypeFormatError('Media type header value must not be empty', input ?? '', 0);
  }

  const { value, length } = parseMediaTypeAt(input, 0);
  if (length !== input.length) {
    fail(input, length, 'unexpected trailing content');
  }

  return value;
}

/**
 * Parses a single media-type header value without throwing
 *
 * @param input - Header text
 * @param options - Parser options
 * @returns `{ success: true, value }` or `{ success: false, value: null }`
 */
export function tryParseMediaType(input: string | null | undefined, options?: ParserOptions): TryParseResult {
  try {
    return { success: true, value: parseMediaType(input) };
  } catch (error) {
    if (!(error instanceof MediaTypeFormatError)) {
      throw error;
    }
    resolveParserOptions(options).logger.debug(
      { input: error.input, position: error.position },
      error.message
    );
    return { success: false, value: null };
  }
}
