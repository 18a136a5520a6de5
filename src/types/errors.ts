/**
 * Error types for rendmail
 */

/**
 * Error kinds that reach the rewrite engine's recovery policy.
 * `transport` errors are always fatal; `format` errors may be recovered
 * from in lenient mode.
 */
export type RewriteErrorKind = 'transport' | 'format';

/**
 * Stream that failed during a transport error
 */
export type StreamRole = 'input' | 'output' | 'backup';

/**
 * Base class for errors raised while rewriting a message
 */
export abstract class RewriteError extends Error {
  /** Error code */
  code: string;
  /** Discriminant used by the recovery policy */
  abstract readonly kind: RewriteErrorKind;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'RewriteError';
    this.code = code;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Failure reading the input, writing the output or writing the backup copy
 */
export class TransportError extends RewriteError {
  override readonly kind = 'transport' as const;
  /** Which stream failed */
  stream: StreamRole;

  constructor(message: string, stream: StreamRole, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
    this.stream = stream;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * The message does not have the header/MIME structure it claims to have
 * (missing body, malformed field, bad boundary, truncated multipart).
 */
export class MessageFormatError extends RewriteError {
  override readonly kind = 'format' as const;

  constructor(message: string) {
    super(message, 'FORMAT_ERROR');
    this.name = 'MessageFormatError';
  }
}

/**
 * Every concrete rewrite error, narrowed by `kind`
 */
export type AnyRewriteError = TransportError | MessageFormatError;

/**
 * Invalid rewrite configuration (bad glob, bad option value).
 * Raised while options are built, before any message byte is read.
 */
export class ConfigError extends Error {
  code = 'CONFIG_ERROR';
  /** Offending option, when known */
  option?: string;

  constructor(message: string, option?: string) {
    super(message);
    this.name = 'ConfigError';
    this.option = option;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Checks whether an unknown thrown value is one of the rewrite errors
 */
export function isRewriteError(err: unknown): err is AnyRewriteError {
  return err instanceof TransportError || err instanceof MessageFormatError;
}
