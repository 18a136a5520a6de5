/**
 * MIME header handling
 *
 * Provides:
 * - Header field splitting and canonical names
 * - Content-Type parsing with the RFC 2045 default
 * - RFC 2047 encoded-word decoding and ASCII transliteration
 * - Header field folding (RFC 5322)
 *
 * @packageDocumentation
 */

// Header fields
export { parseHeaderField, canonicalHeaderKey } from './header-field.js';
export type { HeaderField } from './header-field.js';

// Content-Type
export {
  parseMediaType,
  isMultipart,
  DEFAULT_CONTENT_TYPE,
  MediaTypeParseError,
} from './content-type.js';
export type { ContentType } from './content-type.js';

// Encoded words and transliteration
export { decodeEncodedWords } from './encoded-words.js';
export { decodeHeaderValue, transliterateToAscii } from './transliterate.js';
export type { DecodedHeaderValue } from './transliterate.js';

// Folding
export {
  foldHeaderField,
  unfoldHeaderLines,
  trimLineTerminator,
  MAX_FOLDED_LINE_LENGTH,
} from './fold.js';
