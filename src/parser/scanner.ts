/**
 * Header Value Scanner
 *
 * Low-level cursor helpers over header text. Each helper starts at a
 * position and reports how many characters it recognised; 0 means no match.
 * Recognises HTTP tokens, quoted strings with backslash escapes, optional
 * whitespace (including obsolete line folding) and separators.
 *
 * @packageDocumentation
 */

/**
 * Non-alphanumeric characters allowed in an HTTP token (RFC 7230 tchar)
 */
const TOKEN_SYMBOLS = new Set(['!', '#', '$', '%', '&', "'", '*', '+', '-', '.', '^', '_', '`', '|', '~']);

const TAB = '\t';
const SPACE = ' ';
const CR = '\r';
const LF = '\n';
const QUOTE = '"';
const BACKSLASH = '\\';

/**
 * Checks if a character is allowed inside an HTTP token
 */
export function isTokenChar(char: string): boolean {
  const code = char.charCodeAt(0);
  if (code >= 0x30 && code <= 0x39) return true; // 0-9
  if (code >= 0x41 && code <= 0x5a) return true; // A-Z
  if (code >= 0x61 && code <= 0x7a) return true; // a-z
  return TOKEN_SYMBOLS.has(char);
}

/**
 * Checks if a character is a control character (CTL) other than HTAB
 */
function isDisallowedControl(char: string): boolean {
  const code = char.charCodeAt(0);
  return (code < 0x20 && char !== TAB) || code === 0x7f;
}

/**
 * Counts the token characters starting at the given position
 *
 * @param input - Text being scanned
 * @param startPos - Position of the first candidate character
 * @returns Length of the token, 0 if there is none
 */
export function getTokenLength(input: string, startPos: number): number {
  let pos = startPos;
  while (pos < input.length && isTokenChar(input[pos])) {
    pos++;
  }
  return pos - startPos;
}

/**
 * Counts optional whitespace starting at the given position.
 * SP and HTAB are whitespace; CRLF counts only when followed by SP or HTAB
 * (obsolete line folding).
 */
export function getWhitespaceLength(input: string, startPos: number): number {
  let pos = startPos;

  while (pos < input.length) {
    const char = input[pos];

    if (char === SPACE || char === TAB) {
      pos++;
      continue;
    }

    if (char === CR && input[pos + 1] === LF) {
      const next = input[pos + 2];
      if (next === SPACE || next === TAB) {
        pos += 3;
        continue;
      }
    }

    break;
  }

  return pos - startPos;
}

/**
 * Measures a quoted string starting at the given position, quotes included.
 * Returns 0 when the position holds no quote, the string is unterminated,
 * or it contains a control character.
 */
export function getQuotedStringLength(input: string, startPos: number): number {
  if (input[startPos] !== QUOTE) {
    return 0;
  }

  let pos = startPos + 1; // Skip opening quote

  while (pos < input.length) {
    const char = input[pos];

    if (char === BACKSLASH) {
      // quoted-pair: the escaped character must exist and be printable
      const escaped = input[pos + 1];
      if (escaped === undefined || isDisallowedControl(escaped)) {
        return 0;
      }
      pos += 2;
      continue;
    }

    if (char === QUOTE) {
      return pos + 1 - startPos;
    }

    if (isDisallowedControl(char)) {
      return 0;
    }

    pos++;
  }

  // Unterminated
  return 0;
}

/**
 * Checks whether the whole string is one HTTP token
 */
export function isToken(value: string): boolean {
  return value.length > 0 && getTokenLength(value, 0) === value.length;
}

/**
 * Checks whether the whole string is exactly one well-formed quoted string
 */
export function isQuotedString(value: string): boolean {
  return value.length > 0 && getQuotedStringLength(value, 0) === value.length;
}

/**
 * Splits header text on commas that sit outside quoted strings.
 * Segments are returned untrimmed; empty segments are kept.
 *
 * @param input - Raw header text
 * @returns Comma-delimited segments with their start offsets
 */
export function splitOnUnquotedCommas(input: string): Array<{ text: string; start: number }> {
  const segments: Array<{ text: string; start: number }> = [];
  let segmentStart = 0;
  let inQuotes = false;
  let pos = 0;

  while (pos < input.length) {
    const char = input[pos];

    if (inQuotes) {
      if (char === BACKSLASH) {
        pos += 2;
        continue;
      }
      if (char === QUOTE) {
        inQuotes = false;
      }
    } else if (char === QUOTE) {
      inQuotes = true;
    } else if (char === ',') {
      segments.push({ text: input.slice(segmentStart, pos), start: segmentStart });
      segmentStart = pos + 1;
    }

    pos++;
  }

  segments.push({ text: input.slice(segmentStart), start: segmentStart });
  return segments;
}
