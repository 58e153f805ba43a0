/**
 * Media-type model exports
 */

export { MediaTypeHeaderValue, type ReadonlyMediaTypeHeaderValue } from './media-type.js';
export { NameValueHeaderValue, type ReadonlyNameValueHeaderValue } from './parameter.js';
export { ParameterCollection, type ReadonlyParameterCollection } from './parameter-collection.js';
export { formatQuality, parseQuality, isValidQuality, QUALITY_PARAMETER } from './quality.js';
