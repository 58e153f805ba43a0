/**
 * Header adapter
 *
 * The only contact between the media-type engine and a request/response
 * object model: a source supplying raw header values and a sink accepting
 * the serialized value.
 *
 * @packageDocumentation
 */

import type { ReadonlyMediaTypeHeaderValue, MediaTypeHeaderValue } from '../model/media-type.js';
import { parseMediaTypeList } from '../parser/list-parser.js';
import { parseMediaType } from '../parser/media-type-parser.js';
import type { ParserOptions } from '../types/config.js';

/**
 * Raw value of one header: a single string, or one string per occurrence
 */
export type RawHeaderValue = string | readonly string[];

/**
 * Supplies raw header values by name
 */
export interface HeaderSource {
  get(name: string): RawHeaderValue | null | undefined;
}

/**
 * Accepts a serialized header value
 */
export interface HeaderSink {
  set(name: string, value: string): void;
}

/**
 * Wraps a plain header record (such as Node's IncomingHttpHeaders) so that
 * names are looked up ignoring case
 *
 * @param record - Header names mapped to their values
 * @returns A header source over the record
 */
export function fromHeaderRecord(
  record: Readonly<Record<string, RawHeaderValue | number | undefined>>
): HeaderSource {
  return {
    get(name: string): RawHeaderValue | undefined {
      const wanted = name.toLowerCase();
      for (const [key, value] of Object.entries(record)) {
        if (key.toLowerCase() !== wanted || value === undefined) continue;
        return typeof value === 'number' ? String(value) : value;
      }
      return undefined;
    },
  };
}

function toArray(value: RawHeaderValue): readonly string[] {
  return typeof value === 'string' ? [value] : value;
}

/**
 * Reads a single media-type header such as Content-Type
 *
 * @param source - Header source
 * @param name - Header name (default: content-type)
 * @returns The parsed value, or null if the header is absent
 * @throws MediaTypeFormatError if the header is malformed or occurs more
 *   than once
 */
export function readMediaType(source: HeaderSource, name = 'content-type'): MediaTypeHeaderValue | null {
  const raw = source.get(name);
  if (raw === null || raw === undefined) {
    return null;
  }
  const values = toArray(raw);
  if (values.length === 0) {
    return null;
  }
  // Repeated occurrences of a single-valued header are folded with commas,
  // which the single-value parser rejects
  return parseMediaType(values.join(','));
}

/**
 * Reads a list-valued media-type header such as Accept, across every
 * occurrence of the header
 *
 * @param source - Header source
 * @param name - Header name (default: accept)
 * @param options - Parser options
 * @returns Parsed values in order; empty if the header is absent
 * @throws MediaTypeFormatError if any entry is malformed
 */
export function readMediaTypeList(
  source: HeaderSource,
  name = 'accept',
  options?: ParserOptions
): MediaTypeHeaderValue[] {
  const raw = source.get(name);
  if (raw === null || raw === undefined) {
    return [];
  }
  return parseMediaTypeList(toArray(raw), options);
}

/**
 * Writes the canonical form of a media type to a header
 *
 * @param sink - Header sink
 * @param value - Media type to serialize
 * @param name - Header name (default: content-type)
 */
export function writeMediaType(
  sink: HeaderSink,
  value: ReadonlyMediaTypeHeaderValue,
  name = 'content-type'
): void {
  sink.set(name, value.toString());
}
