/**
 * Attachment Deletion Policy Tests
 *
 * Glob matching of media types and the delete/keep decision.
 */

import { describe, it, expect } from 'vitest';
import { compileGlob } from '../../src/policy/glob.js';
import {
  BINARY_DELETE_TYPES,
  BINARY_KEEP_TYPES,
  compileGlobs,
  shouldDelete,
} from '../../src/policy/media-type-policy.js';
import { ConfigError } from '../../src/types/errors.js';

describe('compileGlob', () => {
  const matches: Array<[pattern: string, value: string, expected: boolean]> = [
    ['image/*', 'image/png', true],
    ['image/*', 'image/', true],
    ['image/*', 'audio/ogg', false],
    ['*', 'image/png', false],
    ['*/*', 'image/png', true],
    ['*', 'text', true],
    ['image/p?g', 'image/png', true],
    ['image/p?g', 'image/pg', false],
    ['image?png', 'image/png', false],
    ['application/*+xml', 'application/atom+xml', true],
    ['application/*+xml', 'application/xml', false],
    ['application/pgp-*', 'application/pgp-signature', true],
    ['image/[jp]*', 'image/jpeg', true],
    ['image/[jp]*', 'image/gif', false],
    ['image/[^jp]*', 'image/gif', true],
    ['image/[^jp]*', 'image/png', false],
    ['image/[a-f]if', 'image/gif', false],
    ['image/[a-g]if', 'image/gif', true],
    ['text/x\\-c', 'text/x-c', true],
    ['text/\\*', 'text/*', true],
    ['text/\\*', 'text/plain', false],
    ['image/**', 'image/png', true],
    ['IMAGE/*', 'image/png', false],
    ['', '', true],
  ];

  for (const [pattern, value, expected] of matches) {
    it(`should ${expected ? '' : 'not '}match ${JSON.stringify(value)} with ${JSON.stringify(pattern)}`, () => {
      expect(compileGlob(pattern).matches(value)).toBe(expected);
    });
  }

  const malformed = ['image/[', 'image/[]', 'image/[a-]', 'image/[-a]', 'image/[^', 'image/\\', 'image/[a\\'];

  for (const pattern of malformed) {
    it(`should reject ${JSON.stringify(pattern)}`, () => {
      let caught: unknown;
      try {
        compileGlob(pattern);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({
        message: `syntax error in pattern ${JSON.stringify(pattern)}`,
        option: 'pattern',
      });
    });
  }

  it('should keep the source pattern', () => {
    const glob = compileGlob('video/*');
    expect(glob.source).toBe('video/*');
    expect(String(glob)).toBe('video/*');
  });
});

describe('shouldDelete', () => {
  const cases: Array<[mediaType: string, del: string[], keep: string[], expected: boolean]> = [
    ['text/plain', [], [], false],
    ['text/plain', ['audio/*', 'image/*'], [], false],
    ['image/jpeg', ['audio/*', 'image/*'], [], true],
    ['image/jpeg', ['audio/*', 'image/*'], ['image/png'], true],
    ['image/jpeg', ['audio/*', 'image/*'], ['image/png', 'image/jpeg'], false],
  ];

  for (const [mediaType, del, keep, expected] of cases) {
    it(`should decide ${mediaType} with delete=${del.join(',')} keep=${keep.join(',')}`, () => {
      expect(shouldDelete(mediaType, del, keep)).toBe(expected);
      expect(shouldDelete(mediaType, compileGlobs(del), compileGlobs(keep))).toBe(expected);
    });
  }

  it('should throw for a malformed delete glob', () => {
    expect(() => shouldDelete('image/png', ['image/['], [])).toThrow(ConfigError);
  });

  it('should not compile globs after the first matching delete glob', () => {
    expect(shouldDelete('image/png', ['image/*', 'bad['], [])).toBe(true);
  });
});

describe('binary presets', () => {
  const decide = (mediaType: string): boolean =>
    shouldDelete(mediaType, BINARY_DELETE_TYPES, BINARY_KEEP_TYPES);

  it('should delete binary media', () => {
    expect(decide('image/jpeg')).toBe(true);
    expect(decide('audio/mpeg')).toBe(true);
    expect(decide('video/mp4')).toBe(true);
    expect(decide('application/pdf')).toBe(true);
    expect(decide('application/octet-stream')).toBe(true);
  });

  it('should keep text, signatures and structured text', () => {
    expect(decide('text/html')).toBe(false);
    expect(decide('application/pgp-signature')).toBe(false);
    expect(decide('application/pkcs7-signature')).toBe(false);
    expect(decide('application/ld+json')).toBe(false);
    expect(decide('application/xhtml+xml')).toBe(false);
    expect(decide('application/ics')).toBe(false);
    expect(decide('multipart/mixed')).toBe(false);
  });

  it('should compile every preset glob', () => {
    expect(() => compileGlobs([...BINARY_DELETE_TYPES, ...BINARY_KEEP_TYPES])).not.toThrow();
  });
});
