/**
 * Type exports
 */

// Configuration types
export type { ParserOptions, ResolvedParserOptions } from './config.js';
export { resolveParserOptions } from './config.js';

// Error types
export {
  MediaTypeError,
  MediaTypeFormatError,
  MediaTypeOperationError,
  MediaTypeArgumentError,
  MediaTypeRangeError
} from './errors.js';

export type { ErrorKind } from './errors.js';
