import { describe, it, expect } from 'vitest';
import { MediaTypeHeaderValue } from '../../src/model/media-type.js';
import { NameValueHeaderValue } from '../../src/model/parameter.js';
import { parseMediaType } from '../../src/parser/media-type-parser.js';

describe('isSubsetOf', () => {
  it.each([
    ['*/*;', '*/*'],
    ['text/*', 'text/*'],
    ['text/*;', '*/*'],
    ['text/plain;', 'text/plain'],
    ['text/plain', 'text/*'],
    ['text/plain;', '*/*'],
    ['*/*;missingparam=4', '*/*'],
    ['text/*;missingparam=4;', '*/*;'],
    ['text/plain;missingparam=4', '*/*;'],
    ['text/plain;missingparam=4', 'text/*'],
    ['text/plain;charset=utf-8', 'text/plain;charset=utf-8'],
    ['text/plain;version=v1', 'Text/plain;Version=v1'],
    ['text/plain;version=v1', 'tExT/plain;version=V1'],
    ['text/plain;version=v1', 'TEXT/PLAIN;VERSION=V1'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', 'text/plain;charset=utf-8;foo=bar;q=0.0'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', 'text/plain;foo=bar;q=0.0;charset=utf-8'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', 'text/*;charset=utf-8;foo=bar;q=0.0'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', '*/*;charset=utf-8;foo=bar;q=0.0'],
    ['text/plain', 'text/plain;q=0.5'],
    ['text/plain;q=0.1', 'text/plain;q=0.9']
  ])('%s should be a subset of %s', (candidate, pattern) => {
    expect(parseMediaType(candidate).isSubsetOf(parseMediaType(pattern))).toBe(true);
  });

  it.each([
    ['text/*', 'text/plain'],
    ['application/html', 'text/*'],
    ['application/json', 'application/html'],
    ['text/plain;version=v1', 'text/plain;version='],
    ['*/*;', 'text/plain;charset=utf-8;foo=bar;q=0.0'],
    ['text/*;', 'text/plain;charset=utf-8;foo=bar;q=0.0'],
    ['text/*;charset=utf-8;foo=bar;q=0.0', 'text/plain;missingparam=4;'],
    ['*/*;charset=utf-8;foo=bar;q=0.0', 'text/plain;missingparam=4;'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', 'text/plain;missingparam=4;'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', 'text/*;missingparam=4;'],
    ['text/plain;charset=utf-8;foo=bar;q=0.0', '*/*;missingparam=4;'],
    ['text/plain;charset=utf-8', 'text/plain;missingparam=4'],
    ['*/plain', 'text/plain']
  ])('%s should not be a subset of %s', (candidate, pattern) => {
    expect(parseMediaType(candidate).isSubsetOf(parseMediaType(pattern))).toBe(false);
  });

  it('should require bare pattern parameters to be bare', () => {
    const pattern = new MediaTypeHeaderValue('text/plain');
    pattern.parameters.add(new NameValueHeaderValue('flag'));

    expect(parseMediaType('text/plain; flag').isSubsetOf(pattern)).toBe(true);
    expect(parseMediaType('text/plain; flag=on').isSubsetOf(pattern)).toBe(false);
  });

  it('should accept a read-only pattern', () => {
    const pattern = parseMediaType('text/*; charset=utf-8').copyAsReadOnly();

    expect(parseMediaType('text/csv; charset=UTF-8').isSubsetOf(pattern)).toBe(true);
    expect(pattern.isSubsetOf(parseMediaType('*/*'))).toBe(true);
  });
});
