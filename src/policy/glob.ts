/**
 * Shell-style glob patterns for media types
 *
 * Same rules as a path glob: `*` and `?` never match `/`, so `image/*`
 * matches `image/png` and `*` alone matches no media type at all.
 *
 * @packageDocumentation
 */

import { ConfigError } from '../types/errors.js';

/**
 * One element of a compiled pattern
 */
type GlobToken =
  | { type: 'literal'; char: string }
  | { type: 'any' }
  | { type: 'star' }
  | { type: 'class'; negated: boolean; ranges: Array<[lo: string, hi: string]> };

const SEPARATOR = '/';

/**
 * A compiled glob pattern
 */
export class GlobPattern {
  /** Pattern as written */
  readonly source: string;
  private readonly tokens: readonly GlobToken[];

  constructor(source: string, tokens: readonly GlobToken[]) {
    this.source = source;
    this.tokens = tokens;
  }

  /**
   * Tests whether the whole of `value` matches, case-sensitively
   */
  matches(value: string): boolean {
    const chars = Array.from(value);
    const tokens = this.tokens;

    // reachable[j]: the tokens consumed so far can match chars[0..j)
    let reachable: boolean[] = new Array<boolean>(chars.length + 1).fill(false);
    reachable[0] = true;

    for (const token of tokens) {
      const next: boolean[] = new Array<boolean>(chars.length + 1).fill(false);
      for (let j = 0; j <= chars.length; j++) {
        if (token.type === 'star') {
          // Extend a previous match over non-separator characters
          if (reachable[j] || (j > 0 && next[j - 1] && chars[j - 1] !== SEPARATOR)) {
            next[j] = true;
          }
        } else if (j > 0 && reachable[j - 1] && matchesChar(token, chars[j - 1])) {
          next[j] = true;
        }
      }
      reachable = next;
    }

    return reachable[chars.length];
  }

  toString(): string {
    return this.source;
  }
}

function matchesChar(token: Exclude<GlobToken, { type: 'star' }>, ch: string): boolean {
  switch (token.type) {
    case 'literal':
      return token.char === ch;
    case 'any':
      return ch !== SEPARATOR;
    case 'class': {
      const inClass = token.ranges.some(([lo, hi]) => lo <= ch && ch <= hi);
      return inClass !== token.negated;
    }
  }
}

/**
 * Reads one possibly-escaped character inside a class
 *
 * @returns The character and the index after it
 */
function readClassChar(chars: string[], i: number, pattern: string): [string, number] {
  const ch = chars[i];
  if (ch === undefined || ch === '-' || ch === ']') {
    throw badPattern(pattern);
  }
  if (ch === '\\') {
    const escaped = chars[i + 1];
    if (escaped === undefined) {
      throw badPattern(pattern);
    }
    return [escaped, i + 2];
  }
  return [ch, i + 1];
}

function badPattern(pattern: string): ConfigError {
  return new ConfigError(`syntax error in pattern ${JSON.stringify(pattern)}`, 'pattern');
}

/**
 * Compiles a glob pattern
 *
 * Supported syntax: `*`, `?`, `[abc]`, `[a-z]`, `[^a-z]` and `\` escapes.
 *
 * @throws ConfigError for an unterminated or empty class, a misplaced `-`
 * or `]` inside a class, or a trailing backslash
 */
export function compileGlob(pattern: string): GlobPattern {
  const chars = Array.from(pattern);
  const tokens: GlobToken[] = [];
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i];
    switch (ch) {
      case '*':
        // Consecutive stars behave as one
        if (tokens[tokens.length - 1]?.type !== 'star') {
          tokens.push({ type: 'star' });
        }
        i++;
        break;
      case '?':
        tokens.push({ type: 'any' });
        i++;
        break;
      case '\\': {
        const escaped = chars[i + 1];
        if (escaped === undefined) {
          throw badPattern(pattern);
        }
        tokens.push({ type: 'literal', char: escaped });
        i += 2;
        break;
      }
      case '[': {
        i++;
        let negated = false;
        if (chars[i] === '^') {
          negated = true;
          i++;
        }
        const ranges: Array<[string, string]> = [];
        for (;;) {
          if (chars[i] === ']' && ranges.length > 0) {
            i++;
            break;
          }
          let lo: string;
          [lo, i] = readClassChar(chars, i, pattern);
          let hi = lo;
          if (chars[i] === '-') {
            [hi, i] = readClassChar(chars, i + 1, pattern);
          }
          ranges.push([lo, hi]);
        }
        tokens.push({ type: 'class', negated, ranges });
        break;
      }
      default:
        tokens.push({ type: 'literal', char: ch });
        i++;
    }
  }

  return new GlobPattern(pattern, tokens);
}
