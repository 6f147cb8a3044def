/**
 * UTF-32 decoder
 *
 * TextDecoder only implements the WHATWG encodings, which leave out UTF-32.
 * Decoding is strict: a truncated code unit, a surrogate or a value above
 * U+10FFFF throws.
 */

const CHUNK_CODE_POINTS = 8192;

export function decodeUtf32(bytes: Uint8Array, littleEndian: boolean): string {
  if (bytes.length % 4 !== 0) {
    throw new TypeError(`Truncated UTF-32 data: ${bytes.length % 4} trailing byte(s)`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const parts: string[] = [];
  let codePoints: number[] = [];

  for (let offset = 0; offset < bytes.length; offset += 4) {
    const codePoint = view.getUint32(offset, littleEndian);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw new TypeError(`Invalid UTF-32 code point 0x${codePoint.toString(16)} at byte ${offset}`);
    }
    codePoints.push(codePoint);
    if (codePoints.length === CHUNK_CODE_POINTS) {
      parts.push(String.fromCodePoint(...codePoints));
      codePoints = [];
    }
  }
  if (codePoints.length > 0) {
    parts.push(String.fromCodePoint(...codePoints));
  }
  return parts.join('');
}
