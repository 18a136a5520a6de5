/**
 * Type exports for rendmail
 */

// Configuration types
export type { RewriteOptions, RewriteOptionsInit } from './options.js';

// Error types
export {
  RewriteError,
  TransportError,
  MessageFormatError,
  ConfigError,
  isRewriteError,
} from './errors.js';

export type { RewriteErrorKind, StreamRole, AnyRewriteError } from './errors.js';
