/**
 * Media-type parameter (name=value pair)
 *
 * The value is stored as it appears on the wire: null for a bare
 * parameter, '' for `name=`, a token, or a quoted string with its quotes.
 *
 * @packageDocumentation
 */

import { isQuotedString, isToken } from '../parser/scanner.js';
import {
  MediaTypeArgumentError,
  MediaTypeFormatError,
  readOnlyError,
} from '../types/errors.js';
import { equalsIgnoreCase, hashIgnoreCase, optionalEqualsIgnoreCase } from './compare.js';

/**
 * Read-only view of a parameter
 */
export interface ReadonlyNameValueHeaderValue {
  readonly name: string;
  readonly value: string | null;
  readonly isReadOnly: boolean;
  equals(other: ReadonlyNameValueHeaderValue | null | undefined): boolean;
  getHashCode(): number;
  copy(): NameValueHeaderValue;
  toString(): string;
}

function checkName(name: string | null | undefined): string {
  if (name === null || name === undefined || name.length === 0) {
    throw new MediaTypeArgumentError('Parameter name must not be empty', 'name');
  }
  if (!isToken(name)) {
    throw new MediaTypeFormatError(`Invalid parameter name: ${name}`, name);
  }
  return name;
}

function checkValue(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value.length > 0 && !isToken(value) && !isQuotedString(value)) {
    throw new MediaTypeFormatError(`Invalid parameter value: ${value}`, value);
  }
  return value;
}

/**
 * A single media-type parameter
 */
export class NameValueHeaderValue implements ReadonlyNameValueHeaderValue {
  readonly name: string;
  private _value: string | null;
  private _readOnly = false;

  /**
   * @param name - Parameter name; must be a token
   * @param value - Token, quoted string, '' or omitted for a bare parameter
   */
  constructor(name: string, value?: string | null) {
    this.name = checkName(name);
    this._value = checkValue(value);
  }

  get value(): string | null {
    return this._value;
  }

  set value(value: string | null) {
    if (this._readOnly) {
      throw readOnlyError('set parameter value');
    }
    this._value = checkValue(value);
  }

  get isReadOnly(): boolean {
    return this._readOnly;
  }

  /**
   * Freezes the parameter. Called by the owning collection.
   * @internal
   */
  markReadOnly(): void {
    this._readOnly = true;
  }

  /**
   * Checks whether this parameter has the given name, ignoring case
   */
  hasName(name: string): boolean {
    return equalsIgnoreCase(this.name, name);
  }

  equals(other: ReadonlyNameValueHeaderValue | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return equalsIgnoreCase(this.name, other.name) && optionalEqualsIgnoreCase(this._value, other.value);
  }

  getHashCode(): number {
    const nameHash = hashIgnoreCase(this.name);
    return this._value === null ? nameHash : nameHash ^ Math.imul(hashIgnoreCase(this._value), 31);
  }

  /**
   * Mutable copy, regardless of this parameter's state
   */
  copy(): NameValueHeaderValue {
    return new NameValueHeaderValue(this.name, this._value);
  }

  toString(): string {
    return this._value === null ? this.name : `${this.name}=${this._value}`;
  }
}
