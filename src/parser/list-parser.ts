/**
 * Media-Type List Parser
 *
 * Parses comma-delimited lists of media types such as an Accept header,
 * possibly spread over several header occurrences. Commas inside quoted
 * strings do not split. Empty segments are skipped. One malformed segment
 * fails the whole call.
 *
 * @packageDocumentation
 */

import type { MediaTypeHeaderValue } from '../model/media-type.js';
import { resolveParserOptions, type ParserOptions } from '../types/config.js';
import { MediaTypeFormatError } from '../types/errors.js';
import { parseMediaType } from './media-type-parser.js';
import { getWhitespaceLength, splitOnUnquotedCommas } from './scanner.js';

/**
 * Outcome of a non-throwing list parse
 */
export type TryParseListResult =
  | { success: true; values: MediaTypeHeaderValue[] }
  | { success: false; values: null };

/**
 * Checks whether a segment holds nothing but header whitespace
 * (SP, HTAB, folded CRLF)
 */
function isBlank(segment: string): boolean {
  return getWhitespaceLength(segment, 0) === segment.length;
}

/**
 * Parses every media type in the given header values, in order
 *
 * @param inputs - Raw header values; null or empty yields an empty list
 * @param options - Parser options
 * @returns Parsed values in encounter order
 * @throws MediaTypeFormatError if any segment is malformed
 */
export function parseMediaTypeList(
  inputs: readonly string[] | null | undefined,
  options?: ParserOptions
): MediaTypeHeaderValue[] {
  const { logger } = resolveParserOptions(options);
  const values: MediaTypeHeaderValue[] = [];

  if (!inputs) {
    return values;
  }

  for (const input of inputs) {
    for (const segment of splitOnUnquotedCommas(input)) {
      if (isBlank(segment.text)) {
        continue;
      }

      try {
        values.push(parseMediaType(segment.text));
      } catch (error) {
        if (error instanceof MediaTypeFormatError) {
          logger.debug({ input, segment: segment.text, offset: segment.start }, 'Rejected media type list segment');
        }
        throw error;
      }
    }
  }

  return values;
}

/**
 * Parses every media type in the given header values without throwing.
 * Fails when any segment is malformed or when no value is found at all.
 *
 * @param inputs - Raw header values
 * @param options - Parser options
 * @returns `{ success: true, values }` or `{ success: false, values: null }`
 */
export function tryParseMediaTypeList(
  inputs: readonly string[] | null | undefined,
  options?: ParserOptions
): TryParseListResult {
  let values: MediaTypeHeaderValue[];
  try {
    values = parseMediaTypeList(inputs, options);
  } catch (error) {
    if (error instanceof MediaTypeFormatError) {
      return { success: false, values: null };
    }
    throw error;
  }

  if (values.length === 0) {
    return { success: false, values: null };
  }
  return { success: true, values };
}
