/**
 * Ordered parameter collection owned by a media-type value
 *
 * Keeps insertion order for serialization and resolves names
 * case-insensitively. Duplicate names are allowed; lookups return the
 * first match.
 *
 * @packageDocumentation
 */

import { MediaTypeArgumentError, readOnlyError } from '../types/errors.js';
import { NameValueHeaderValue, type ReadonlyNameValueHeaderValue } from './parameter.js';

/**
 * Read-only view of a parameter collection
 */
export interface ReadonlyParameterCollection extends Iterable<ReadonlyNameValueHeaderValue> {
  readonly count: number;
  readonly isReadOnly: boolean;
  at(index: number): ReadonlyNameValueHeaderValue | undefined;
  find(name: string): ReadonlyNameValueHeaderValue | undefined;
  toArray(): ReadonlyNameValueHeaderValue[];
  equals(other: ReadonlyParameterCollection): boolean;
  getHashCode(): number;
}

export class ParameterCollection implements ReadonlyParameterCollection {
  private readonly items: NameValueHeaderValue[] = [];
  private _readOnly = false;

  get count(): number {
    return this.items.length;
  }

  get isReadOnly(): boolean {
    return this._readOnly;
  }

  /**
   * Appends a parameter. Pass a fresh or copied parameter; one that is
   * still held by another value would share its state.
   *
   * @throws MediaTypeOperationError if the collection is read-only
   * @throws MediaTypeArgumentError if no parameter is given or it is read-only
   */
  add(parameter: NameValueHeaderValue | null | undefined): void {
    if (this._readOnly) {
      throw readOnlyError('add parameter');
    }
    if (!parameter) {
      throw new MediaTypeArgumentError('Parameter must be provided', 'parameter');
    }
    if (parameter.isReadOnly) {
      throw new MediaTypeArgumentError('Cannot add a read-only parameter; add a copy instead', 'parameter');
    }
    this.items.push(parameter);
  }

  /**
   * Removes the first parameter with the same name (case-insensitive)
   *
   * @returns True if a parameter was removed
   */
  remove(parameter: ReadonlyNameValueHeaderValue): boolean {
    if (this._readOnly) {
      throw readOnlyError('remove parameter');
    }
    const index = this.indexOf(parameter.name);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  clear(): void {
    if (this._readOnly) {
      throw readOnlyError('clear parameters');
    }
    this.items.length = 0;
  }

  at(index: number): NameValueHeaderValue | undefined {
    return this.items[index];
  }

  /**
   * First parameter with the given name, ignoring case
   */
  find(name: string): NameValueHeaderValue | undefined {
    return this.items.find((item) => item.hasName(name));
  }

  /**
   * Index of the first parameter with the given name, -1 if absent
   */
  indexOf(name: string): number {
    return this.items.findIndex((item) => item.hasName(name));
  }

  toArray(): NameValueHeaderValue[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<NameValueHeaderValue> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Freezes the collection and every parameter in it
   */
  makeReadOnly(): void {
    if (this._readOnly) {
      return;
    }
    this._readOnly = true;
    for (const item of this.items) {
      item.markReadOnly();
    }
  }

  /**
   * Deep mutable copy
   */
  copy(): ParameterCollection {
    const result = new ParameterCollection();
    for (const item of this.items) {
      result.items.push(item.copy());
    }
    return result;
  }

  /**
   * Multiset equality: same count and each parameter pairs with a distinct
   * name/value match (case-insensitive) in the other collection
   */
  equals(other: ReadonlyParameterCollection): boolean {
    if (this.count !== other.count) {
      return false;
    }
    const theirs = other.toArray();
    const used: boolean[] = new Array<boolean>(theirs.length).fill(false);
    for (const item of this.items) {
      const index = theirs.findIndex((candidate, i) => !used[i] && item.equals(candidate));
      if (index === -1) {
        return false;
      }
      used[index] = true;
    }
    return true;
  }

  /**
   * Order-independent hash of the contained parameters
   */
  getHashCode(): number {
    let hash = 0;
    for (const item of this.items) {
      hash ^= item.getHashCode();
    }
    return hash;
  }
}
