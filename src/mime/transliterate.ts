/**
 * Header value transliteration to 7-bit ASCII
 *
 * @packageDocumentation
 */

import { decodeEncodedWords } from './encoded-words.js';
import { UnsupportedCharsetError } from '../encoding/charset.js';

/**
 * Result of {@link decodeHeaderValue}
 */
export interface DecodedHeaderValue {
  /** ASCII rendering of the value; empty when `ok` is false */
  value: string;
  /** False if the value could not be decoded (e.g. unsupported charset) */
  ok: boolean;
}

/** Combining marks left behind by canonical decomposition */
const NONSPACING_MARKS = /\p{Mn}/gu;

/**
 * Everything outside printable US-ASCII except horizontal tab (RFC 5322 2.2)
 */
const NON_FIELD_BODY_CHARS = /[^\t\x20-\x7e]/gu;

/**
 * Strips diacritics and drops whatever is left outside printable ASCII
 *
 * @param text - Already-decoded Unicode text
 */
export function transliterateToAscii(text: string): string {
  return text
    .normalize('NFD')
    .replace(NONSPACING_MARKS, '')
    .normalize('NFC')
    .replace(NON_FIELD_BODY_CHARS, '');
}

/**
 * Converts an RFC 2047 header value to 7-bit ASCII
 *
 * Encoded words are decoded, accents are removed from their base letters,
 * and any remaining non-ASCII characters are dropped, so
 * `=?ISO-8859-1?Q?Andr=E9?= Pirard` becomes `Andre Pirard`.
 *
 * @param value - Unfolded header field value, still encoded
 */
export function decodeHeaderValue(value: string): DecodedHeaderValue {
  let decoded: string;
  try {
    decoded = decodeEncodedWords(value);
  } catch (err) {
    if (err instanceof UnsupportedCharsetError) {
      return { value: '', ok: false };
    }
    throw err;
  }
  return { value: transliterateToAscii(decoded), ok: true };
}
