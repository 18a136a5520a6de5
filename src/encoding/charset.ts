/**
 * Charset conversion for decoded encoded-word payloads
 *
 * Only the charsets a mail reader can rely on are accepted; anything else
 * makes the whole header value undecodable.
 */

import * as iconv from 'iconv-lite';

/**
 * Charsets accepted in encoded words, keyed by lower-cased name
 */
const DECODERS = new Map<string, (bytes: Buffer) => string>([
  ['utf-8', (bytes) => bytes.toString('utf-8')],
  ['iso-8859-1', (bytes) => bytes.toString('latin1')],
  // Bytes outside 7-bit ASCII become U+FFFD rather than being reinterpreted
  ['us-ascii', (bytes) => Array.from(bytes, (b) => (b < 0x80 ? String.fromCharCode(b) : '\uFFFD')).join('')],
  ['windows-1252', (bytes) => iconv.decode(bytes, 'windows-1252')],
]);

/**
 * Raised when an encoded word declares a charset we cannot convert
 */
export class UnsupportedCharsetError extends Error {
  /** Charset as written in the encoded word */
  charset: string;

  constructor(charset: string) {
    super(`unhandled charset "${charset}"`);
    this.name = 'UnsupportedCharsetError';
    this.charset = charset;
  }
}

/**
 * Decodes bytes in the given charset to a string
 *
 * @throws UnsupportedCharsetError for any charset other than UTF-8,
 * ISO-8859-1, US-ASCII or Windows-1252
 */
export function decodeCharset(bytes: Buffer, charset: string): string {
  const decoder = DECODERS.get(charset.toLowerCase());
  if (decoder === undefined) {
    throw new UnsupportedCharsetError(charset);
  }
  return decoder(bytes);
}
