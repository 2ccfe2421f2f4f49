/**
 * Best-effort text decoding for template files
 *
 * Templates are often saved by Windows editors in a legacy East-Asian
 * encoding, so UTF-8 is tried first and a fixed list of fallbacks after it.
 */

/** Decoding order for template files */
export const DEFAULT_ENCODINGS: readonly string[] = [
  'utf-8',
  'shift_jis',
  'euc-jp',
  'iso-2022-jp',
  'gb18030',
  'big5',
  'euc-kr',
];

/**
 * Strictly decode bytes with one encoding
 *
 * Returns null when the bytes are invalid for the encoding or the runtime
 * does not support it.
 */
function tryDecode(bytes: Uint8Array, encoding: string): string | null {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    return null;
  }

  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Decode bytes with the first encoding that accepts them
 *
 * Falls back to lossy UTF-8 (invalid sequences become U+FFFD), so decoding
 * never fails.
 */
export function decodeText(
  bytes: Uint8Array,
  encodings: readonly string[] = DEFAULT_ENCODINGS
): string {
  for (const encoding of encodings) {
    const text = tryDecode(bytes, encoding);
    if (text !== null) {
      return text;
    }
  }
  return new TextDecoder('utf-8').decode(bytes);
}
