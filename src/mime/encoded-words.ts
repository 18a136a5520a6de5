/**
 * RFC 2047 encoded-word decoding
 *
 * Format: =?charset?encoding?encoded_text?=
 *
 * @packageDocumentation
 */

import { base64DecodeStrict } from '../encoding/base64.js';
import { qDecode } from '../encoding/quoted-printable.js';
import { decodeCharset } from '../encoding/charset.js';

/**
 * Decodes the payload of a single encoded word
 *
 * @returns Raw bytes, or `null` if the payload or encoding letter is invalid
 */
function decodePayload(encoding: string, text: string): Buffer | null {
  switch (encoding) {
    case 'B':
    case 'b':
      return base64DecodeStrict(text);
    case 'Q':
    case 'q':
      return qDecode(text);
    default:
      return null;
  }
}

/**
 * Whether `s` contains anything besides linear whitespace
 */
function hasNonWhitespace(s: string): boolean {
  return /[^ \t\r\n]/.test(s);
}

/**
 * Decodes RFC 2047 encoded words in a header value
 *
 * Linear whitespace between two adjacent encoded words is dropped (RFC 2047
 * section 6.2); whitespace next to ordinary text is kept. A word whose
 * payload is not valid base64 or Q encoding is copied through literally.
 *
 * @param value - Header value potentially containing encoded words
 * @returns Decoded header value
 * @throws UnsupportedCharsetError if a well-formed word uses a charset
 * that cannot be converted
 */
export function decodeEncodedWords(value: string): string {
  let i = value.indexOf('=?');
  if (i === -1) {
    return value;
  }

  let out = value.substring(0, i);
  let rest = value.substring(i);
  let betweenWords = false;

  for (;;) {
    const start = rest.indexOf('=?');
    if (start === -1) break;
    let cur = start + 2;

    i = rest.indexOf('?', cur);
    if (i === -1) break;
    const charset = rest.substring(cur, i);
    cur = i + 1;

    // Shortest remainder is "Q??="
    if (rest.length < cur + 4) break;
    const encoding = rest[cur];
    cur++;
    if (rest[cur] !== '?') break;
    cur++;

    const j = rest.indexOf('?=', cur);
    if (j === -1) break;
    const text = rest.substring(cur, j);
    const end = j + 2;

    const payload = decodePayload(encoding, text);
    if (payload === null) {
      // Not an encoded word after all; keep "=?" and rescan after it
      betweenWords = false;
      out += rest.substring(0, start + 2);
      rest = rest.substring(start + 2);
      continue;
    }

    const before = rest.substring(0, start);
    if (start > 0 && (!betweenWords || hasNonWhitespace(before))) {
      out += before;
    }

    out += decodeCharset(payload, charset);
    rest = rest.substring(end);
    betweenWords = true;
  }

  return out + rest;
}
