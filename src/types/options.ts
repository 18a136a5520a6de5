/**
 * Configuration types for rendmail
 */

import type { Logger } from 'pino';
import type { GlobPattern } from '../policy/glob.js';

/**
 * Options for a single rewrite, as supplied by a caller
 * (CLI flags, a JSON fixture, library code)
 */
export interface RewriteOptionsInit {
  /** Globs for attachment media types to delete, e.g. `image/*` */
  deleteMediaTypes?: string[];
  /** Globs that override `deleteMediaTypes` */
  keepMediaTypes?: string[];
  /** Time stamped into deletion placeholders (default: now) */
  now?: Date;
  /** Minutes east of UTC used when formatting `now` (default: local zone) */
  timeZoneOffset?: number;
  /** Add an ASCII `X-Rendmail-Subject` field after each `Subject` */
  decodeSubject?: boolean;
  /** Fail on malformed messages instead of copying the rest verbatim */
  strict?: boolean;
  /** Log informational diagnostics */
  verbose?: boolean;
  /** Maximum multipart nesting depth (default: 64) */
  maxDepth?: number;
  /** Diagnostic logger (default: one built from `verbose`) */
  logger?: Logger;
}

/**
 * Validated, immutable options used by the rewrite engine
 */
export interface RewriteOptions {
  readonly deleteMediaTypes: readonly GlobPattern[];
  readonly keepMediaTypes: readonly GlobPattern[];
  readonly now: Date;
  readonly timeZoneOffset: number;
  readonly decodeSubject: boolean;
  readonly strict: boolean;
  readonly verbose: boolean;
  readonly maxDepth: number;
  readonly logger: Logger;
}
