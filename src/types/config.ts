/**
 * Configuration types for the media-type parsers
 */

import { logger as defaultLogger, type Logger } from '../logging/logger.js';

/**
 * Options accepted by the parse entry points
 */
export interface ParserOptions {
  /** Logger receiving debug output for rejected input (default: module logger) */
  logger?: Logger;
}

/**
 * Parser options with every default applied
 */
export interface ResolvedParserOptions {
  logger: Logger;
}

/**
 * Fills in defaults for unset options
 *
 * @param options - Caller supplied options
 * @returns Options with defaults applied
 */
export function resolveParserOptions(options?: ParserOptions): ResolvedParserOptions {
  return {
    logger: options?.logger ?? defaultLogger,
  };
}
