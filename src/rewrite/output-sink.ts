/**
 * Ordered writes to the output stream
 *
 * @packageDocumentation
 */

import type { Writable } from 'node:stream';
import { TransportError, type StreamRole } from '../types/errors.js';

/**
 * Writes chunks to a `Writable` one at a time, waiting for each write to
 * be accepted before the next one, and reports stream failures as
 * {@link TransportError}.
 */
export class OutputSink {
  private readonly stream: Writable;
  private readonly role: StreamRole;
  private failure: Error | null = null;
  private readonly onError = (err: Error): void => {
    this.failure ??= err;
  };
  /** Bytes accepted so far */
  bytesWritten = 0;

  constructor(stream: Writable, role: StreamRole = 'output') {
    this.stream = stream;
    this.role = role;
    // Errors also reach the write callback; the listener keeps an 'error'
    // event from going unhandled while we own the stream.
    stream.on('error', this.onError);
  }

  /**
   * Writes one chunk
   *
   * @throws TransportError if the stream has failed or fails on this write
   */
  write(chunk: Buffer | string): Promise<void> {
    if (this.failure !== null) {
      return Promise.reject(this.wrap(this.failure));
    }
    if (chunk.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.stream.write(chunk, (err) => {
        if (err) {
          this.failure ??= err;
          reject(this.wrap(err));
          return;
        }
        this.bytesWritten += typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.length;
        resolve();
      });
    });
  }

  /**
   * Writes several chunks in order
   */
  async writeAll(chunks: Iterable<Buffer | string>): Promise<void> {
    for (const chunk of chunks) {
      await this.write(chunk);
    }
  }

  /**
   * Stops listening for stream errors; the stream itself stays open
   */
  release(): void {
    this.stream.off('error', this.onError);
  }

  private wrap(err: Error): TransportError {
    return new TransportError(`Failed writing ${this.role}: ${err.message}`, this.role, err);
  }
}
