/**
 * Backup copy of the unmodified input
 *
 * @packageDocumentation
 */

import { randomBytes } from 'node:crypto';
import { open, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import type { ByteSource, SourceChunk } from '../reader/message-reader.js';
import { TransportError } from '../types/errors.js';

/**
 * An open backup file
 */
export interface BackupFile {
  /** Full path of the file */
  readonly path: string;
  /** Appends a chunk */
  write(chunk: SourceChunk): Promise<void>;
  /** Flushes and closes the file */
  close(): Promise<void>;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * File name prefix for a backup taken at `now`: `20060102-150405.000`, UTC
 */
export function backupFilePrefix(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}-` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}.` +
    pad(now.getUTCMilliseconds(), 3)
  );
}

/**
 * Creates a new, uniquely named backup file in `dir`
 *
 * @throws TransportError if the file cannot be created
 */
export async function openBackupFile(dir: string, now: Date): Promise<BackupFile> {
  const filePath = path.join(dir, `${backupFilePrefix(now)}-${randomBytes(6).toString('hex')}`);

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'wx', 0o600);
  } catch (err) {
    throw new TransportError(
      `Failed creating file: ${err instanceof Error ? err.message : String(err)}`,
      'backup',
      err
    );
  }

  return {
    path: filePath,
    async write(chunk) {
      try {
        await handle.write(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
      } catch (err) {
        throw new TransportError(
          `Failed writing message to ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
          'backup',
          err
        );
      }
    },
    async close() {
      try {
        await handle.close();
      } catch (err) {
        throw new TransportError(
          `Failed closing file: ${err instanceof Error ? err.message : String(err)}`,
          'backup',
          err
        );
      }
    },
  };
}

/**
 * Source wrapper that copies each chunk to a backup before passing it on
 *
 * The backup sees exactly the bytes that were pulled from the source, in
 * order. Because the wrapped generator is never closed by the message
 * reader, {@link drain} can pull whatever the reader left behind.
 */
export class TeeSource implements ByteSource {
  private readonly generator: AsyncGenerator<SourceChunk>;

  constructor(source: ByteSource, backup: BackupFile) {
    this.generator = (async function* () {
      for await (const chunk of source) {
        await backup.write(chunk);
        yield chunk;
      }
    })();
  }

  [Symbol.asyncIterator](): AsyncIterator<SourceChunk> {
    return this.generator;
  }

  /**
   * Pulls the rest of the source through the backup, discarding it
   */
  async drain(): Promise<void> {
    for (;;) {
      const result = await this.generator.next();
      if (result.done) return;
    }
  }
}
