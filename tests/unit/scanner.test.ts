import { describe, it, expect } from 'vitest';
import {
  getQuotedStringLength,
  getTokenLength,
  getWhitespaceLength,
  isQuotedString,
  isToken,
  isTokenChar,
  splitOnUnquotedCommas
} from '../../src/parser/scanner.js';

describe('Header value scanner', () => {
  describe('tokens', () => {
    it('should accept RFC 7230 token characters', () => {
      for (const char of "!#$%&'*+-.^_`|~09AZaz") {
        expect(isTokenChar(char)).toBe(true);
      }
    });

    it('should reject separators, whitespace and non-ASCII', () => {
      for (const char of '()<>@,;:\\"/[]?={} \tä\u0001') {
        expect(isTokenChar(char)).toBe(false);
      }
    });

    it('should measure a token up to the first separator', () => {
      expect(getTokenLength('text/plain', 0)).toBe(4);
      expect(getTokenLength('text/plain', 5)).toBe(5);
      expect(getTokenLength('/plain', 0)).toBe(0);
      expect(getTokenLength('abc', 3)).toBe(0);
    });

    it('should check whole strings', () => {
      expect(isToken('application')).toBe(true);
      expect(isToken('')).toBe(false);
      expect(isToken('a b')).toBe(false);
    });
  });

  describe('whitespace', () => {
    it('should consume spaces, tabs and folded line breaks', () => {
      expect(getWhitespaceLength(' \t\r\n x', 0)).toBe(5);
      expect(getWhitespaceLength('\r\n\tx', 0)).toBe(3);
    });

    it('should not consume a line break without continuation', () => {
      expect(getWhitespaceLength('\r\nx', 0)).toBe(0);
      expect(getWhitespaceLength(' \r\n', 0)).toBe(1);
      expect(getWhitespaceLength('\n x', 0)).toBe(0);
    });
  });

  describe('quoted strings', () => {
    it('should measure a quoted string including its quotes', () => {
      expect(getQuotedStringLength('"abc" rest', 0)).toBe(5);
      expect(getQuotedStringLength('x="a,b"', 2)).toBe(5);
      expect(getQuotedStringLength('""', 0)).toBe(2);
    });

    it('should honour backslash escapes', () => {
      // "a\"b"
      expect(getQuotedStringLength('"a\\"b"', 0)).toBe(6);
      // "a\\"
      expect(getQuotedStringLength('"a\\\\"', 0)).toBe(5);
    });

    it('should reject unterminated or malformed quoted strings', () => {
      expect(getQuotedStringLength('"abc', 0)).toBe(0);
      expect(getQuotedStringLength('"abc\\', 0)).toBe(0);
      expect(getQuotedStringLength('"a\u0001b"', 0)).toBe(0);
      expect(getQuotedStringLength('abc', 0)).toBe(0);
    });

    it('should allow tabs and non-ASCII text inside quotes', () => {
      expect(isQuotedString('"a\tb"')).toBe(true);
      expect(isQuotedString('"café"')).toBe(true);
      expect(isQuotedString('"a" ')).toBe(false);
    });
  });

  describe('splitOnUnquotedCommas', () => {
    it('should split on commas outside quotes only', () => {
      expect(splitOnUnquotedCommas('a,"b,c",d')).toEqual([
        { text: 'a', start: 0 },
        { text: '"b,c"', start: 2 },
        { text: 'd', start: 8 }
      ]);
    });

    it('should keep empty segments', () => {
      expect(splitOnUnquotedCommas(',')).toEqual([
        { text: '', start: 0 },
        { text: '', start: 1 }
      ]);
    });

    it('should not end a quoted span at an escaped quote', () => {
      expect(splitOnUnquotedCommas('"a\\",b",c').map((s) => s.text)).toEqual(['"a\\",b"', 'c']);
    });
  });
});
