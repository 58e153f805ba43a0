/**
 * media-type-headers - Parsing, comparison and serialization of HTTP
 * media-type header values (Content-Type, Accept)
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Media-type model
export * from './model/index.js';

// Scanner, value parser and list parser
export * from './parser/index.js';

// Header adapter
export * from './http/index.js';

export { logger, type Logger } from './logging/logger.js';
