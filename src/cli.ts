/**
 * Command-line interface
 *
 * Reads one message from stdin and writes the rewritten message to stdout,
 * for use as a filter by a mail delivery agent (procmail, fdm, ...). The
 * exit status is 0 on success (including lenient recoveries), 1 if the
 * message could not be rewritten or backed up, and 2 for usage errors.
 */

import type { Writable } from 'node:stream';
import { z } from 'zod';
import { TeeSource, openBackupFile, type BackupFile } from './backup/backup-file.js';
import { createLogger } from './config/logger.js';
import { createRewriteOptions, splitList } from './config/options.js';
import { BINARY_DELETE_TYPES, BINARY_KEEP_TYPES } from './policy/media-type-policy.js';
import type { ByteSource } from './reader/message-reader.js';
import { rewriteMessage } from './rewrite/engine.js';
import { ConfigError, isRewriteError } from './types/errors.js';
import type { RewriteOptions } from './types/options.js';

/**
 * Streams used by {@link runCli}
 */
export interface CliIo {
  stdin: ByteSource;
  stdout: Writable;
  stderr: Writable;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const BOOLEAN_FLAGS = new Set(['decode-subject', 'delete-binary', 'help', 'strict', 'verbose']);
const STRING_FLAGS = new Set(['backup-dir', 'delete-types', 'fake-now', 'keep-types']);

const USAGE = `
Usage: rendmail [flag]...
Reads an email message from stdin and rewrites it to stdout.

Flags:
  --backup-dir <dir>      Directory to which original, unmodified message will be saved
  --decode-subject        Add an ASCII X-Rendmail-Subject field after each Subject field
  --delete-binary         Delete common binary attachments from message
  --delete-types <globs>  Comma-separated globs of attachment media types to delete
  --fake-now <time>       Hardcoded RFC 3339 time (only used for testing)
  --keep-types <globs>    Comma-separated glob overrides for --delete-types
  --strict                Fail instead of copying the rest of a malformed message
  --verbose               Log diagnostics to stderr
`.trim();

/**
 * Invalid command line
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** RFC 3339 date-time, capturing the zone designator */
const RFC3339_PATTERN =
  /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?<zone>[Zz]|(?<sign>[+-])(?<hours>\d{2}):(?<minutes>\d{2}))$/;

/**
 * A parsed `--fake-now` value: the instant plus the offset it was written in
 */
export interface FixedTime {
  date: Date;
  offsetMinutes: number;
}

/**
 * Parses an RFC 3339 timestamp, keeping its zone offset
 *
 * @throws UsageError for anything else
 */
export function parseRfc3339(value: string): FixedTime {
  const groups = RFC3339_PATTERN.exec(value)?.groups;
  const date = new Date(value);
  if (!groups || Number.isNaN(date.getTime())) {
    throw new UsageError(`Bad --fake-now time: ${JSON.stringify(value)} is not RFC 3339`);
  }

  let offsetMinutes = 0;
  if (groups.sign !== undefined) {
    const magnitude = Number(groups.hours) * 60 + Number(groups.minutes);
    offsetMinutes = groups.sign === '-' ? -magnitude : magnitude;
  }
  return { date, offsetMinutes };
}

const cliFlagsSchema = z
  .object({
    'backup-dir': z.string().min(1, 'must not be empty').optional(),
    'decode-subject': z.boolean().default(false),
    'delete-binary': z.boolean().default(false),
    'delete-types': z.string().optional(),
    'fake-now': z.string().optional(),
    help: z.boolean().default(false),
    'keep-types': z.string().optional(),
    strict: z.boolean().default(false),
    verbose: z.boolean().default(false),
  })
  .strict();

export type CliFlags = z.infer<typeof cliFlagsSchema>;

/**
 * Parses command-line flags
 *
 * Flags may start with one or two dashes (`-strict`, `--strict`); values
 * follow as `--flag=value` or `--flag value`. Boolean flags also accept
 * `=true` and `=false`.
 *
 * @throws UsageError for unknown flags, missing values or stray arguments
 */
export function parseCliFlags(args: readonly string[]): CliFlags {
  const raw: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h') {
      raw.help = true;
      continue;
    }
    const match = /^--?([a-z][a-z-]*)(?:=(.*))?$/s.exec(arg);
    if (!match) {
      throw new UsageError(`Unexpected argument ${JSON.stringify(arg)}`);
    }
    const [, name, inlineValue] = match;

    if (BOOLEAN_FLAGS.has(name)) {
      if (inlineValue === undefined || inlineValue === 'true') {
        raw[name] = true;
      } else if (inlineValue === 'false') {
        raw[name] = false;
      } else {
        throw new UsageError(`Invalid boolean value ${JSON.stringify(inlineValue)} for --${name}`);
      }
    } else if (STRING_FLAGS.has(name)) {
      if (inlineValue !== undefined) {
        raw[name] = inlineValue;
      } else if (i + 1 < args.length) {
        raw[name] = args[++i];
      } else {
        throw new UsageError(`Flag needs an argument: --${name}`);
      }
    } else {
      throw new UsageError(`Flag provided but not defined: -${name}`);
    }
  }

  const parsed = cliFlagsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`Invalid --${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Builds rewrite options from flags
 *
 * @throws UsageError for conflicting flags or a bad `--fake-now`
 * @throws ConfigError for malformed globs
 */
export function buildRewriteOptions(
  flags: CliFlags,
  stderr: Writable,
  wallClock: Date = new Date()
): RewriteOptions {
  const fixed = flags['fake-now'] !== undefined ? parseRfc3339(flags['fake-now']) : undefined;

  let deleteMediaTypes: string[];
  let keepMediaTypes: string[];
  if (flags['delete-binary']) {
    if (flags['delete-types'] || flags['keep-types']) {
      throw new UsageError('--delete-binary is incompatible with --delete-types and --keep-types');
    }
    deleteMediaTypes = [...BINARY_DELETE_TYPES];
    keepMediaTypes = [...BINARY_KEEP_TYPES];
  } else {
    deleteMediaTypes = splitList(flags['delete-types']);
    keepMediaTypes = splitList(flags['keep-types']);
  }

  return createRewriteOptions({
    deleteMediaTypes,
    keepMediaTypes,
    now: fixed?.date ?? wallClock,
    timeZoneOffset: fixed?.offsetMinutes,
    decodeSubject: flags['decode-subject'],
    strict: flags.strict,
    verbose: flags.verbose,
    logger: createLogger({ verbose: flags.verbose, destination: stderr }),
  });
}

function printLine(stream: Writable, text: string): void {
  stream.write(`${text}\n`);
}

/**
 * Runs the CLI
 *
 * @param args - Arguments after the program name
 * @returns Process exit status
 */
export async function runCli(args: readonly string[], io: CliIo): Promise<number> {
  let flags: CliFlags;
  let options: RewriteOptions;
  try {
    flags = parseCliFlags(args);
    if (flags.help) {
      printLine(io.stderr, USAGE);
      return EXIT_OK;
    }
    options = buildRewriteOptions(flags, io.stderr);
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigError) {
      printLine(io.stderr, err.message);
      printLine(io.stderr, USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }

  const backupDir = flags['backup-dir'];
  if (backupDir !== undefined) {
    return rewriteWithBackup(backupDir, io, options);
  }
  return rewrite(io.stdin, io, options);
}

async function rewrite(input: ByteSource, io: CliIo, options: RewriteOptions): Promise<number> {
  try {
    const stats = await rewriteMessage(input, io.stdout, options);
    options.logger.info(stats, 'Rewrote message');
    return EXIT_OK;
  } catch (err) {
    if (!isRewriteError(err)) throw err;
    options.logger.error({ kind: err.kind, err: err.message }, 'Failed rewriting message');
    return EXIT_FAILURE;
  }
}

/**
 * Rewrites while saving every input byte to a new file in `dir`. The backup
 * is completed even when rewriting fails, so that the delivery agent's
 * copy can be discarded safely only on success.
 */
async function rewriteWithBackup(dir: string, io: CliIo, options: RewriteOptions): Promise<number> {
  let backup: BackupFile;
  try {
    backup = await openBackupFile(dir, options.now);
  } catch (err) {
    if (!isRewriteError(err)) throw err;
    options.logger.error({ err: err.message }, 'Failed creating backup');
    return EXIT_FAILURE;
  }

  const tee = new TeeSource(io.stdin, backup);
  let code = await rewrite(tee, io, options);

  // Copy whatever the rewrite did not read
  try {
    await tee.drain();
  } catch (err) {
    if (!isRewriteError(err)) throw err;
    options.logger.error({ path: backup.path, err: err.message }, 'Failed writing backup');
    code = EXIT_FAILURE;
  }
  try {
    await backup.close();
  } catch (err) {
    if (!isRewriteError(err)) throw err;
    options.logger.error({ path: backup.path, err: err.message }, 'Failed closing backup');
    code = EXIT_FAILURE;
  }

  options.logger.info({ path: backup.path }, 'Saved original message');
  return code;
}
