/**
 * Header field splitting and name canonicalization
 *
 * @packageDocumentation
 */

import { MessageFormatError } from '../types/errors.js';

/**
 * A parsed header field
 */
export interface HeaderField {
  /** Canonical name, e.g. `Content-Type` */
  key: string;
  /** Value with leading whitespace removed, still encoded */
  value: Buffer;
}

const COLON = 0x3a;

/**
 * Bytes allowed in a field name for canonicalization: RFC 7230 token chars
 */
function isTokenByte(code: number): boolean {
  if (code >= 0x30 && code <= 0x39) return true; // 0-9
  if (code >= 0x41 && code <= 0x5a) return true; // A-Z
  if (code >= 0x61 && code <= 0x7a) return true; // a-z
  return "!#$%&'*+-.^_`|~".includes(String.fromCharCode(code));
}

/**
 * Returns the canonical form of a header field name: the first letter and
 * any letter following a hyphen upper-cased, everything else lower-cased
 * (`content-TYPE` becomes `Content-Type`).
 *
 * Names containing spaces or other non-token characters are returned
 * unchanged, so they never compare equal to a well-known name.
 */
export function canonicalHeaderKey(name: string): string {
  for (let i = 0; i < name.length; i++) {
    if (!isTokenByte(name.charCodeAt(i))) {
      return name;
    }
  }

  let upper = true;
  let out = '';
  for (const ch of name) {
    out += upper ? ch.toUpperCase() : ch.toLowerCase();
    upper = ch === '-';
  }
  return out;
}

/**
 * Splits an unfolded header line such as `from: "Bob" <user@example.org>`
 * into a canonical key and its value
 *
 * @param unfolded - Logical header line without its terminator
 * @throws MessageFormatError if the line has no colon
 */
export function parseHeaderField(unfolded: Buffer): HeaderField {
  const idx = unfolded.indexOf(COLON);
  if (idx < 0) {
    throw new MessageFormatError(
      `malformed header field ${JSON.stringify(unfolded.toString('latin1'))}: missing colon`
    );
  }

  const key = canonicalHeaderKey(unfolded.subarray(0, idx).toString('latin1'));

  let start = idx + 1;
  while (start < unfolded.length && (unfolded[start] === 0x20 || unfolded[start] === 0x09)) {
    start++;
  }

  return { key, value: unfolded.subarray(start) };
}
