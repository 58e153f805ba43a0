import { describe, it, expect } from 'vitest';
import {
  fromHeaderRecord,
  readMediaType,
  readMediaTypeList,
  writeMediaType,
  type HeaderSink
} from '../../src/http/headers.js';
import { MediaTypeHeaderValue } from '../../src/model/media-type.js';
import { MediaTypeFormatError } from '../../src/types/errors.js';

function mapSink(): HeaderSink & { headers: Map<string, string> } {
  const headers = new Map<string, string>();
  return {
    headers,
    set(name: string, value: string): void {
      headers.set(name, value);
    }
  };
}

describe('Header adapter', () => {
  describe('fromHeaderRecord', () => {
    it('should look names up ignoring case', () => {
      const source = fromHeaderRecord({ 'Content-Type': 'text/plain', 'content-length': 42 });

      expect(source.get('content-type')).toBe('text/plain');
      expect(source.get('CONTENT-LENGTH')).toBe('42');
      expect(source.get('accept')).toBeUndefined();
    });

    it('should skip undefined entries', () => {
      const source = fromHeaderRecord({ accept: undefined });

      expect(source.get('accept')).toBeUndefined();
    });
  });

  describe('readMediaType', () => {
    it('should parse the content-type header', () => {
      const source = fromHeaderRecord({ 'content-type': 'application/json; charset=utf-8' });
      const value = readMediaType(source);

      expect(value?.mediaType).toBe('application/json');
      expect(value?.charset).toBe('utf-8');
    });

    it('should read a named header', () => {
      const source = fromHeaderRecord({ 'x-original-type': ['text/csv'] });

      expect(readMediaType(source, 'x-original-type')?.toString()).toBe('text/csv');
    });

    it('should return null when the header is absent', () => {
      expect(readMediaType(fromHeaderRecord({}))).toBeNull();
      expect(readMediaType(fromHeaderRecord({ 'content-type': [] }))).toBeNull();
    });

    it('should reject a malformed or repeated header', () => {
      expect(() => readMediaType(fromHeaderRecord({ 'content-type': 'text' }))).toThrow(MediaTypeFormatError);
      expect(() => readMediaType(fromHeaderRecord({ 'content-type': ['text/plain', 'text/html'] })))
        .toThrow(MediaTypeFormatError);
    });
  });

  describe('readMediaTypeList', () => {
    it('should parse every occurrence of the accept header', () => {
      const source = fromHeaderRecord({ Accept: ['text/html,application/json', '*/*;q=0.1'] });
      const values = readMediaTypeList(source);

      expect(values.map((value) => value.toString())).toEqual([
        'text/html',
        'application/json',
        '*/*; q=0.1'
      ]);
    });

    it('should return an empty list when the header is absent', () => {
      expect(readMediaTypeList(fromHeaderRecord({}))).toEqual([]);
    });

    it('should reject a malformed entry', () => {
      const source = fromHeaderRecord({ accept: 'text/html, nonsense' });

      expect(() => readMediaTypeList(source)).toThrow(MediaTypeFormatError);
    });
  });

  describe('writeMediaType', () => {
    it('should write the canonical form', () => {
      const sink = mapSink();
      const value = new MediaTypeHeaderValue('text/plain');
      value.charset = 'utf-8';

      writeMediaType(sink, value);

      expect(sink.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    });

    it('should write a read-only value to a named header', () => {
      const sink = mapSink();
      const value = new MediaTypeHeaderValue('application/problem+json').copyAsReadOnly();

      writeMediaType(sink, value, 'x-error-type');

      expect(sink.headers.get('x-error-type')).toBe('application/problem+json');
    });
  });
});
