export {
  DEFAULT_ENCODING,
  canonicalEncodingName,
  decodeBytes,
  decodeText,
  detectEncoding,
  getPreambleLength,
  resolveEncoding,
  unquoteCharset,
} from './EncodingResolver.js';
export type { ResolvedEncoding } from './EncodingResolver.js';
