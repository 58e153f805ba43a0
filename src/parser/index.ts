/**
 * Parser layer exports
 */

export {
  isTokenChar,
  isToken,
  isQuotedString,
  getTokenLength,
  getWhitespaceLength,
  getQuotedStringLength,
  splitOnUnquotedCommas
} from './scanner.js';

export {
  parseMediaType,
  parseMediaTypeAt,
  tryParseMediaType,
  type TryParseResult
} from './media-type-parser.js';

export {
  parseMediaTypeList,
  tryParseMediaTypeList,
  type TryParseListResult
} from './list-parser.js';
