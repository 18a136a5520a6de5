/**
 * Content-Type parsing (RFC 2045 section 5.1)
 *
 * @packageDocumentation
 */

/**
 * Parsed Content-Type field
 */
export interface ContentType {
  /** Lower-cased `type/subtype`, e.g. `multipart/mixed` */
  mediaType: string;
  /** Parameters keyed by lower-cased name */
  params: ReadonlyMap<string, string>;
}

/**
 * Raised by {@link parseMediaType} for a syntactically invalid value
 */
export class MediaTypeParseError extends Error {
  /** Value that failed to parse */
  rawValue: string;

  constructor(message: string, rawValue: string) {
    super(message);
    this.name = 'MediaTypeParseError';
    this.rawValue = rawValue;
  }
}

/**
 * RFC 2045 5.2: assumed when Content-Type is absent or syntactically invalid
 */
export const DEFAULT_CONTENT_TYPE: ContentType = Object.freeze({
  mediaType: 'text/plain',
  params: new Map([['charset', 'us-ascii']]),
});

/** RFC 2045 tspecials */
const TSPECIALS = new Set('()<>@,;:\\"/[]?='.split(''));

function isTokenChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code > 0x20 && code < 0x7f && !TSPECIALS.has(ch);
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\v' || ch === '\f';
}

function trimLeftSpace(s: string): string {
  let i = 0;
  while (i < s.length && isSpace(s[i])) i++;
  return s.substring(i);
}

/**
 * Splits a leading token from `s`
 *
 * @returns The token (possibly empty) and the remaining text
 */
function consumeToken(s: string): [token: string, rest: string] {
  let i = 0;
  while (i < s.length && isTokenChar(s[i])) i++;
  return [s.substring(0, i), s.substring(i)];
}

/**
 * Splits a leading token or quoted-string from `s`
 *
 * An unterminated quoted string, or one containing a line break, yields an
 * empty value and `s` unchanged.
 */
function consumeValue(s: string): [value: string, rest: string] {
  if (s === '') return ['', ''];
  if (s[0] !== '"') return consumeToken(s);

  let value = '';
  for (let i = 1; i < s.length; i++) {
    const ch = s[i];
    if (ch === '"') {
      return [value, s.substring(i + 1)];
    }
    // Only tspecials may be escaped; other backslashes are literal
    if (ch === '\\' && i + 1 < s.length && TSPECIALS.has(s[i + 1])) {
      value += s[i + 1];
      i++;
      continue;
    }
    if (ch === '\r' || ch === '\n') {
      return ['', s];
    }
    value += ch;
  }
  return ['', s];
}

/**
 * Reads one `; name=value` parameter
 *
 * @returns Empty name when no well-formed parameter starts at `s`
 */
function consumeParam(s: string): [name: string, value: string, rest: string] {
  let rest = trimLeftSpace(s);
  if (!rest.startsWith(';')) return ['', '', s];
  rest = trimLeftSpace(rest.substring(1));

  let name: string;
  [name, rest] = consumeToken(rest);
  name = name.toLowerCase();
  if (name === '') return ['', '', s];

  rest = trimLeftSpace(rest);
  if (!rest.startsWith('=')) return ['', '', s];
  rest = trimLeftSpace(rest.substring(1));

  const [value, afterValue] = consumeValue(rest);
  if (value === '' && afterValue === rest) return ['', '', s];
  return [name, value, afterValue];
}

function isHexDigit(ch: string): boolean {
  return /^[0-9A-Fa-f]$/.test(ch);
}

/**
 * Decodes `%XX` escapes, one character per byte
 *
 * @returns `null` if a `%` is not followed by two hex digits
 */
function percentHexUnescape(s: string): string | null {
  let out = '';
  for (let i = 0; i < s.length; i++) {
    if (s[i] !== '%') {
      out += s[i];
      continue;
    }
    if (i + 2 >= s.length || !isHexDigit(s[i + 1]) || !isHexDigit(s[i + 2])) {
      return null;
    }
    out += String.fromCharCode(parseInt(s.substring(i + 1, i + 3), 16));
    i += 2;
  }
  return out;
}

/** Charsets accepted in RFC 2231 extended values */
const EXTENDED_VALUE_CHARSETS = new Set(['us-ascii', 'utf-8']);

/**
 * Decodes an RFC 2231 extended value, `charset'language'%XX...`
 *
 * The language is ignored. The result keeps one character per byte like
 * the rest of the field value.
 *
 * @returns `null` for a malformed value or an unaccepted charset
 */
function decodeExtendedValue(value: string): string | null {
  const first = value.indexOf("'");
  const second = first === -1 ? -1 : value.indexOf("'", first + 1);
  if (second === -1) return null;

  const charset = value.substring(0, first).toLowerCase();
  if (!EXTENDED_VALUE_CHARSETS.has(charset)) return null;
  return percentHexUnescape(value.substring(second + 1));
}

/**
 * Joins RFC 2231 pieces of one parameter: `name*` on its own, otherwise
 * `name*0`, `name*1`, ... (each optionally `*`-suffixed when encoded) up
 * to the first missing index
 *
 * @returns `null` when no usable piece exists
 */
function joinExtendedPieces(name: string, pieces: ReadonlyMap<string, string>): string | null {
  const whole = pieces.get(`${name}*`);
  if (whole !== undefined) {
    return decodeExtendedValue(whole);
  }

  let joined = '';
  let found = false;
  for (let n = 0; ; n++) {
    const plain = pieces.get(`${name}*${n}`);
    if (plain !== undefined) {
      joined += plain;
      found = true;
      continue;
    }
    const encoded = pieces.get(`${name}*${n}*`);
    if (encoded === undefined) break;
    found = true;
    // Only the first piece carries the charset and language
    joined += (n === 0 ? decodeExtendedValue(encoded) : percentHexUnescape(encoded)) ?? '';
  }
  return found ? joined : null;
}

/**
 * Validates `type/subtype` (or a bare `type`)
 */
function checkMediaType(mediaType: string, raw: string): void {
  const [type, rest] = consumeToken(mediaType);
  if (type === '') {
    throw new MediaTypeParseError('no media type', raw);
  }
  if (rest === '') return;
  if (!rest.startsWith('/')) {
    throw new MediaTypeParseError('expected slash after first token', raw);
  }
  const [subtype, tail] = consumeToken(rest.substring(1));
  if (subtype === '') {
    throw new MediaTypeParseError('expected token after slash', raw);
  }
  if (tail !== '') {
    throw new MediaTypeParseError('unexpected content after media subtype', raw);
  }
}

/**
 * Parses a Content-Type field value
 *
 * @param value - Unfolded field value, e.g. `multipart/mixed; boundary="b1"`
 * RFC 2231 continuations and extended values (`title*0*=us-ascii'en'...`)
 * are merged into one parameter under the plain name, replacing a plain
 * parameter of that name.
 *
 * @throws MediaTypeParseError if the media type or a parameter is malformed,
 * or a parameter is repeated with a different value
 */
export function parseMediaType(value: string): ContentType {
  const semi = value.indexOf(';');
  const base = semi === -1 ? value : value.substring(0, semi);
  const mediaType = base.toLowerCase().trim();
  checkMediaType(mediaType, value);

  const params = new Map<string, string>();
  // Starred parameters keyed by full name, grouped under the plain name
  const extended = new Map<string, Map<string, string>>();
  let rest = value.substring(base.length);

  while (rest.length > 0) {
    rest = trimLeftSpace(rest);
    if (rest.length === 0) break;

    const [name, paramValue, afterParam] = consumeParam(rest);
    if (name === '') {
      // A trailing semicolon is tolerated
      if (afterParam.trim() === ';') break;
      throw new MediaTypeParseError('invalid media parameter', value);
    }

    const star = name.indexOf('*');
    let target = params;
    if (star !== -1) {
      const baseName = name.substring(0, star);
      target = extended.get(baseName) ?? new Map<string, string>();
      extended.set(baseName, target);
    }

    const existing = target.get(name);
    if (existing !== undefined && existing !== paramValue) {
      throw new MediaTypeParseError(`duplicate parameter name "${name}"`, value);
    }
    target.set(name, paramValue);
    rest = afterParam;
  }

  for (const [baseName, pieces] of extended) {
    const joined = joinExtendedPieces(baseName, pieces);
    if (joined !== null) params.set(baseName, joined);
  }

  return { mediaType, params };
}

/**
 * Whether the media type is any `multipart/*` type
 */
export function isMultipart(contentType: ContentType): boolean {
  return contentType.mediaType.startsWith('multipart/');
}
