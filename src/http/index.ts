/**
 * Header adapter exports
 */

export {
  fromHeaderRecord,
  readMediaType,
  readMediaTypeList,
  writeMediaType,
  type HeaderSource,
  type HeaderSink,
  type RawHeaderValue
} from './headers.js';
