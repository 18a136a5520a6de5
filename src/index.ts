/**
 * rendmail - rewrites email messages byte for byte, deleting unwanted
 * attachments and adding an ASCII copy of the subject
 *
 * @packageDocumentation
 */

// Types and errors
export * from './types/index.js';

// Configuration and logging
export { createRewriteOptions, splitList, DEFAULT_MAX_DEPTH } from './config/options.js';
export { createLogger, silentLogger } from './config/logger.js';
export type { Logger, LoggerOptions } from './config/logger.js';

// Encoded-word payload decoders
export * from './encoding/index.js';

// Line reader
export * from './reader/index.js';

// MIME headers
export * from './mime/index.js';

// Deletion policy
export * from './policy/index.js';

// Rewrite engine
export { rewriteMessage, MessageRewriter } from './rewrite/engine.js';
export type { RewriteStats } from './rewrite/engine.js';
export { OutputSink } from './rewrite/output-sink.js';
export { formatRfc1123Z, deletionPlaceholder } from './rewrite/placeholder.js';

// Backup
export { openBackupFile, TeeSource, backupFilePrefix } from './backup/backup-file.js';
export type { BackupFile } from './backup/backup-file.js';

// CLI
export { runCli, parseCliFlags, parseRfc3339, UsageError } from './cli.js';
export type { CliIo, CliFlags } from './cli.js';
