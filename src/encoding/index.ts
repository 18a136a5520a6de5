/**
 * Decoders for RFC 2047 encoded-word payloads
 *
 * @packageDocumentation
 */

export { base64DecodeStrict } from './base64.js';
export { qDecode } from './quoted-printable.js';
export { decodeCharset, UnsupportedCharsetError } from './charset.js';
