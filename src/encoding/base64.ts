/**
 * Base64 decoding for RFC 2047 "B" encoded words
 *
 * Node's Buffer decoder silently skips characters outside the alphabet, so
 * the payload is validated first: a malformed word must be left as literal
 * text rather than decoded into garbage.
 */

/**
 * Padded base64 alphabet (RFC 4648 section 4)
 */
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decodes a padded base64 string to a Buffer
 *
 * Line breaks are ignored; any other character outside the alphabet, or
 * missing padding, is rejected.
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer, or `null` if the input is not valid base64
 */
export function base64DecodeStrict(encoded: string): Buffer | null {
  const cleaned = encoded.replace(/[\r\n]/g, '');
  if (!BASE64_PATTERN.test(cleaned)) {
    return null;
  }
  return Buffer.from(cleaned, 'base64');
}
