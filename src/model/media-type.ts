/**
 * Media-Type Header Value
 *
 * The `type/subtype` pair of a Content-Type or Accept entry plus its
 * parameters. Provides the charset and quality accessors, equality and
 * hashing that ignore case and parameter order, serialization, copying,
 * and the subset test used by content negotiation.
 *
 * @packageDocumentation
 */

import { getTokenLength, isToken } from '../parser/scanner.js';
import {
  MediaTypeArgumentError,
  MediaTypeFormatError,
  MediaTypeRangeError,
  readOnlyError,
} from '../types/errors.js';
import { equalsIgnoreCase, hashIgnoreCase, optionalEqualsIgnoreCase } from './compare.js';
import { NameValueHeaderValue } from './parameter.js';
import { ParameterCollection, type ReadonlyParameterCollection } from './parameter-collection.js';
import { QUALITY_PARAMETER, formatQuality, isValidQuality, parseQuality } from './quality.js';

const CHARSET_PARAMETER = 'charset';
const WILDCARD = '*';

/**
 * Read-only view of a media-type value. Returned by copyAsReadOnly().
 */
export interface ReadonlyMediaTypeHeaderValue {
  readonly type: string;
  readonly subtype: string;
  readonly mediaType: string;
  readonly charset: string | null;
  readonly quality: number | null;
  readonly parameters: ReadonlyParameterCollection;
  readonly isReadOnly: boolean;
  equals(other: ReadonlyMediaTypeHeaderValue | null | undefined): boolean;
  getHashCode(): number;
  isSubsetOf(pattern: ReadonlyMediaTypeHeaderValue): boolean;
  copy(): MediaTypeHeaderValue;
  copyAsReadOnly(): ReadonlyMediaTypeHeaderValue;
  toString(): string;
}

/**
 * Splits and validates a strict `type/subtype` string: no whitespace,
 * no parameters, nothing else
 */
function splitMediaType(mediaType: string | null | undefined): [string, string] {
  if (mediaType === null || mediaType === undefined || mediaType.length === 0) {
    throw new MediaTypeArgumentError('Media type must not be empty', 'mediaType');
  }

  const typeLength = getTokenLength(mediaType, 0);
  if (typeLength === 0 || mediaType[typeLength] !== '/') {
    throw new MediaTypeFormatError(`Invalid media type: ${mediaType}`, mediaType, typeLength);
  }

  const subtype = mediaType.slice(typeLength + 1);
  if (!isToken(subtype)) {
    throw new MediaTypeFormatError(`Invalid media type: ${mediaType}`, mediaType, typeLength + 1);
  }

  return [mediaType.slice(0, typeLength), subtype];
}

function checkToken(value: string, argument: string): string {
  if (!isToken(value)) {
    throw new MediaTypeFormatError(`Invalid ${argument}: ${value}`, value);
  }
  return value;
}

export class MediaTypeHeaderValue implements ReadonlyMediaTypeHeaderValue {
  private _type: string;
  private _subtype: string;
  private _parameters: ParameterCollection;
  private _readOnly = false;

  /**
   * @param mediaType - Exactly `type/subtype`, e.g. "text/plain"
   * @param quality - Optional q value in [0, 1]
   * @throws MediaTypeArgumentError if mediaType is empty
   * @throws MediaTypeFormatError if mediaType is not `token/token`
   * @throws MediaTypeRangeError if quality is outside [0, 1]
   */
  constructor(mediaType: string, quality?: number) {
    const [type, subtype] = splitMediaType(mediaType);
    this._type = type;
    this._subtype = subtype;
    this._parameters = new ParameterCollection();
    if (quality !== undefined) {
      this.quality = quality;
    }
  }

  get type(): string {
    return this._type;
  }

  set type(value: string) {
    this.checkWritable('set type');
    this._type = checkToken(value, 'type');
  }

  get subtype(): string {
    return this._subtype;
  }

  set subtype(value: string) {
    this.checkWritable('set subtype');
    this._subtype = checkToken(value, 'subtype');
  }

  /**
   * Combined `type/subtype`
   */
  get mediaType(): string {
    return `${this._type}/${this._subtype}`;
  }

  set mediaType(value: string) {
    this.checkWritable('set media type');
    const [type, subtype] = splitMediaType(value);
    this._type = type;
    this._subtype = subtype;
  }

  get parameters(): ParameterCollection {
    return this._parameters;
  }

  get isReadOnly(): boolean {
    return this._readOnly;
  }

  /**
   * Value of the first charset parameter, or null
   */
  get charset(): string | null {
    return this._parameters.find(CHARSET_PARAMETER)?.value ?? null;
  }

  set charset(value: string | null) {
    this.checkWritable('set charset');
    this.setParameter(CHARSET_PARAMETER, value);
  }

  /**
   * Numeric value of the first q parameter, or null.
   *
   * @throws MediaTypeFormatError if the stored q text is not a number
   */
  get quality(): number | null {
    const parameter = this._parameters.find(QUALITY_PARAMETER);
    if (!parameter) {
      return null;
    }
    const quality = parameter.value === null ? null : parseQuality(parameter.value);
    if (quality === null) {
      throw new MediaTypeFormatError(
        `Invalid quality value: ${parameter.value ?? ''}`,
        parameter.toString()
      );
    }
    return quality;
  }

  set quality(value: number | null) {
    this.checkWritable('set quality');
    if (value === null) {
      this.setParameter(QUALITY_PARAMETER, null);
      return;
    }
    if (!isValidQuality(value)) {
      throw new MediaTypeRangeError(`Quality must be between 0 and 1, got ${value}`, 'quality', value);
    }
    this.setParameter(QUALITY_PARAMETER, formatQuality(value));
  }

  /**
   * Equal when type and subtype match ignoring case and the parameters
   * match as a set (names and values ignoring case, order ignored)
   */
  equals(other: ReadonlyMediaTypeHeaderValue | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return (
      equalsIgnoreCase(this._type, other.type) &&
      equalsIgnoreCase(this._subtype, other.subtype) &&
      this._parameters.equals(other.parameters)
    );
  }

  getHashCode(): number {
    const typeHash = (Math.imul(hashIgnoreCase(this._type), 31) + hashIgnoreCase(this._subtype)) | 0;
    return typeHash ^ this._parameters.getHashCode();
  }

  /**
   * Checks whether this media type is acceptable under `pattern`.
   *
   * A `*` type or subtype in the pattern matches anything; a wildcard here
   * does not match a concrete pattern. Every pattern parameter except q must
   * appear here with the same value; extra parameters here are fine.
   */
  isSubsetOf(pattern: ReadonlyMediaTypeHeaderValue): boolean {
    if (pattern.type !== WILDCARD && !equalsIgnoreCase(this._type, pattern.type)) {
      return false;
    }

    if (pattern.subtype !== WILDCARD && !equalsIgnoreCase(this._subtype, pattern.subtype)) {
      return false;
    }

    for (const required of pattern.parameters) {
      if (equalsIgnoreCase(required.name, QUALITY_PARAMETER)) {
        continue;
      }
      const satisfied = this._parameters
        .toArray()
        .some((local) => local.hasName(required.name) && optionalEqualsIgnoreCase(local.value, required.value));
      if (!satisfied) {
        return false;
      }
    }

    return true;
  }

  /**
   * Deep mutable copy, regardless of this value's state
   */
  copy(): MediaTypeHeaderValue {
    const result = new MediaTypeHeaderValue(this.mediaType);
    result._parameters = this._parameters.copy();
    return result;
  }

  /**
   * Deep frozen copy. Always a new instance.
   */
  copyAsReadOnly(): ReadonlyMediaTypeHeaderValue {
    const result = this.copy();
    result.makeReadOnly();
    return result;
  }

  /**
   * Canonical wire form: `type/subtype; name=value; ...`
   */
  toString(): string {
    let result = this.mediaType;
    for (const parameter of this._parameters) {
      result += `; ${parameter.toString()}`;
    }
    return result;
  }

  /**
   * Equality that tolerates absent operands
   */
  static equals(
    a: ReadonlyMediaTypeHeaderValue | null | undefined,
    b: ReadonlyMediaTypeHeaderValue | null | undefined
  ): boolean {
    if (!a || !b) {
      return !a && !b;
    }
    return a.equals(b);
  }

  private makeReadOnly(): void {
    this._readOnly = true;
    this._parameters.makeReadOnly();
  }

  private checkWritable(operation: string): void {
    if (this._readOnly) {
      throw readOnlyError(operation);
    }
  }

  /**
   * Overwrites the first parameter with this name in place, appends one,
   * or removes it when value is null
   */
  private setParameter(name: string, value: string | null): void {
    const existing = this._parameters.find(name);
    if (value === null) {
      if (existing) {
        this._parameters.remove(existing);
      }
      return;
    }
    if (existing) {
      existing.value = value;
    } else {
      this._parameters.add(new NameValueHeaderValue(name, value));
    }
  }
}
