/**
 * Codec entrypoint: field codecs and the {@link Timestamp} value type.
 * @module
 */
export {
  boolean,
  type Codec,
  type CodecValue,
  enumeration,
  identifier,
  integer,
  isJsonObject,
  list,
  type NestedModel,
  number,
  object,
  record,
  schema,
  string,
  timestamp,
} from './codecs.js';
export { Timestamp } from './timestamp.js';
