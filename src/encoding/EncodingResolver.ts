/**
 * Encoding Resolver
 *
 * Works out how to turn buffered body bytes into text:
 * 1. A declared charset wins. Unknown names fail with INVALID_CHARSET
 *    instead of falling back to sniffing.
 * 2. Without a charset, a byte-order mark selects the encoding.
 * 3. Otherwise UTF-8 is assumed. That default is a heuristic; a body in
 *    another encoding without a mark decodes wrongly or fails.
 *
 * Decoding always starts after the byte-order mark.
 */

import { TextDecoder } from 'node:util';
import { createDecodeError, createInvalidCharsetError } from '../utils/errors.js';
import { decodeUtf32 } from './utf32.js';

/**
 * Result of resolving the encoding of a byte range
 */
export interface ResolvedEncoding {
  /** Canonical encoding name, e.g. 'utf-8' or 'utf-16le' */
  encoding: string;
  /** Number of leading byte-order-mark bytes to skip */
  preambleLength: number;
}

export const DEFAULT_ENCODING = 'utf-8';

const PREAMBLES: Readonly<Record<string, readonly number[]>> = {
  'utf-8': [0xef, 0xbb, 0xbf],
  'utf-16le': [0xff, 0xfe],
  'utf-16be': [0xfe, 0xff],
  'utf-32le': [0xff, 0xfe, 0x00, 0x00],
  'utf-32be': [0x00, 0x00, 0xfe, 0xff],
};

// Labels TextDecoder does not know about
const UTF32_LABELS: Readonly<Record<string, string>> = {
  'utf-32': 'utf-32le',
  'utf-32le': 'utf-32le',
  'utf-32be': 'utf-32be',
};

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  if (prefix.length === 0 || bytes.length < prefix.length) {
    return false;
  }
  return prefix.every((value, index) => bytes[index] === value);
}

/**
 * Strip at most one pair of surrounding double quotes
 */
export function unquoteCharset(charset: string): string {
  if (charset.length > 2 && charset.startsWith('"') && charset.endsWith('"')) {
    return charset.slice(1, -1);
  }
  return charset;
}

/**
 * Map a charset label to its canonical encoding name
 *
 * @throws {ContentError} INVALID_CHARSET for labels no decoder supports
 */
export function canonicalEncodingName(label: string): string {
  const normalized = label.trim().toLowerCase();
  const utf32 = UTF32_LABELS[normalized];
  if (utf32) {
    return utf32;
  }
  try {
    return new TextDecoder(normalized).encoding;
  } catch (error) {
    throw createInvalidCharsetError(label, error);
  }
}

/**
 * Length of the byte-order mark of `encoding` at the start of `bytes`, or 0
 */
export function getPreambleLength(bytes: Uint8Array, encoding: string): number {
  const preamble = PREAMBLES[encoding];
  return preamble && startsWith(bytes, preamble) ? preamble.length : 0;
}

/**
 * Detect the encoding from a byte-order mark
 *
 * The first two bytes decide. FF FE is UTF-32LE when followed by 00 00 and
 * UTF-16LE otherwise. The UTF-32BE mark is not sniffed.
 */
export function detectEncoding(bytes: Uint8Array): ResolvedEncoding | null {
  if (bytes.length < 2) {
    return null;
  }

  const first2Bytes = (bytes[0] << 8) | bytes[1];
  switch (first2Bytes) {
    case 0xefbb:
      if (bytes.length >= 3 && bytes[2] === 0xbf) {
        return { encoding: 'utf-8', preambleLength: 3 };
      }
      return null;
    case 0xfffe:
      if (bytes.length >= 4 && bytes[2] === 0x00 && bytes[3] === 0x00) {
        return { encoding: 'utf-32le', preambleLength: 4 };
      }
      return { encoding: 'utf-16le', preambleLength: 2 };
    case 0xfeff:
      return { encoding: 'utf-16be', preambleLength: 2 };
    default:
      return null;
  }
}

/**
 * Resolve the encoding of `bytes` from a declared charset or a byte-order mark
 */
export function resolveEncoding(bytes: Uint8Array, declaredCharset?: string | null): ResolvedEncoding {
  if (declaredCharset !== undefined && declaredCharset !== null) {
    const encoding = canonicalEncodingName(unquoteCharset(declaredCharset));
    // A mark may be present even when a charset was declared
    return { encoding, preambleLength: getPreambleLength(bytes, encoding) };
  }

  return detectEncoding(bytes) ?? { encoding: DEFAULT_ENCODING, preambleLength: 0 };
}

/**
 * Decode `bytes` with a resolved encoding name
 *
 * @throws {ContentError} DECODE_ERROR when the bytes are invalid for the encoding
 */
export function decodeBytes(bytes: Uint8Array, encoding: string): string {
  try {
    if (encoding === 'utf-32le' || encoding === 'utf-32be') {
      return decodeUtf32(bytes, encoding === 'utf-32le');
    }
    // The mark was already skipped; a second one is content
    return new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw createDecodeError(encoding, error);
  }
}

/**
 * Resolve the encoding and decode, skipping the byte-order mark
 */
export function decodeText(bytes: Uint8Array, declaredCharset?: string | null): string {
  if (bytes.length === 0) {
    return '';
  }
  const { encoding, preambleLength } = resolveEncoding(bytes, declaredCharset);
  return decodeBytes(bytes.subarray(preambleLength), encoding);
}
