/**
 * Attachment deletion policy
 *
 * @packageDocumentation
 */

import { compileGlob, GlobPattern } from './glob.js';

/**
 * A glob as written in configuration, or already compiled
 */
export type MediaTypeGlob = string | GlobPattern;

function toPattern(glob: MediaTypeGlob): GlobPattern {
  return typeof glob === 'string' ? compileGlob(glob) : glob;
}

/**
 * Compiles a list of globs, failing on the first malformed one
 *
 * @throws ConfigError
 */
export function compileGlobs(globs: readonly string[]): GlobPattern[] {
  return globs.map((glob) => compileGlob(glob));
}

/**
 * Decides whether a body part of the given media type should be deleted
 *
 * The delete globs are tried in order and only the first one that matches
 * is considered: the part is deleted unless some keep glob also matches.
 * Because of this, the order of `deleteGlobs` can change the outcome when
 * several of them match.
 *
 * @param mediaType - Lower-cased `type/subtype`
 * @param deleteGlobs - Media types to delete
 * @param keepGlobs - Overrides for `deleteGlobs`
 * @throws ConfigError if an uncompiled glob is malformed
 */
export function shouldDelete(
  mediaType: string,
  deleteGlobs: readonly MediaTypeGlob[],
  keepGlobs: readonly MediaTypeGlob[]
): boolean {
  for (const del of deleteGlobs) {
    if (!toPattern(del).matches(mediaType)) continue;
    return !keepGlobs.some((keep) => toPattern(keep).matches(mediaType));
  }
  return false;
}

/**
 * Media types removed by `--delete-binary`
 */
export const BINARY_DELETE_TYPES: readonly string[] = Object.freeze([
  'application/*',
  'audio/*',
  'image/*',
  'video/*',
]);

/**
 * `application/` types that are text or signatures, kept by `--delete-binary`
 */
export const BINARY_KEEP_TYPES: readonly string[] = Object.freeze([
  'application/ecmascript',
  'application/ics',
  'application/javascript',
  'application/json',
  'application/pgp-*', // signature, encrypted, keys
  'application/pkcs7-signature',
  'application/rtf', // may embed images, but is still a document
  'application/xml',

  'application/*+json',
  'application/*+xml',

  'application/x-csh',
  'application/x-dia-diagram',
  'application/x-ecmascript',
  'application/x-httpd-php',
  'application/x-javascript',
  'application/x-perl',
  'application/x-ruby',
  'application/x-sh',
]);
