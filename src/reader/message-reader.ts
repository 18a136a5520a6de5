/**
 * Line-oriented message reader
 *
 * Reads an email message line by line without altering any byte: every
 * line keeps its original `\r\n` or `\n` terminator, and folded header
 * lines are returned both as the original physical lines and unfolded.
 *
 * @packageDocumentation
 */

import { TransportError } from '../types/errors.js';

/**
 * Chunk types accepted from a byte source
 */
export type SourceChunk = Uint8Array | string;

/**
 * Anything that yields message bytes: a Node `Readable`, or an async
 * generator of chunks
 */
export type ByteSource = AsyncIterable<SourceChunk>;

/**
 * A possibly-folded header line (RFC 5322 section 2.2.3)
 */
export interface FoldedLine {
  /** Original physical lines, each with its terminator (if any) */
  folded: Buffer[];
  /** The lines concatenated with their terminators removed */
  unfolded: Buffer;
}

const LF = 0x0a;
const CR = 0x0d;
const SP = 0x20;
const HTAB = 0x09;

/**
 * Removes a trailing `\r\n` or `\n` from a line
 */
export function trimCRLF(line: Buffer): Buffer {
  let end = line.length;
  if (end > 0 && line[end - 1] === LF) {
    end--;
    if (end > 0 && line[end - 1] === CR) {
      end--;
    }
  }
  return line.subarray(0, end);
}

function toBuffer(chunk: SourceChunk): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf-8');
  }
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Buffered reader over a byte source
 *
 * The source iterator is pulled only when the buffer cannot satisfy a
 * request, and is never closed by the reader, so a caller can keep
 * consuming the same source after the reader is done with it.
 */
export class MessageReader {
  private readonly iterator: AsyncIterator<SourceChunk>;
  private buffer: Buffer = Buffer.alloc(0);
  /** Bytes at the start of `buffer` already known not to contain LF */
  private scanned = 0;
  private ended = false;

  constructor(source: ByteSource) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  /**
   * Pulls the next chunk into the buffer
   *
   * @returns False once the source is exhausted
   * @throws TransportError if the source fails
   */
  private async fill(): Promise<boolean> {
    if (this.ended) return false;

    let result: IteratorResult<SourceChunk>;
    try {
      result = await this.iterator.next();
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(
        `Failed reading message: ${err instanceof Error ? err.message : String(err)}`,
        'input',
        err
      );
    }

    if (result.done) {
      this.ended = true;
      return false;
    }

    const chunk = toBuffer(result.value);
    if (chunk.length > 0) {
      this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    }
    return true;
  }

  /**
   * Reads a single line, including its terminator
   *
   * If the input ends without a final newline, the unterminated remainder
   * is returned as a line. Afterwards (or when the input ends exactly on a
   * line boundary) `null` is returned.
   */
  async readLine(): Promise<Buffer | null> {
    for (;;) {
      const idx = this.buffer.indexOf(LF, this.scanned);
      if (idx !== -1) {
        return this.take(idx + 1);
      }
      this.scanned = this.buffer.length;

      if (!(await this.fill())) {
        return this.buffer.length > 0 ? this.take(this.buffer.length) : null;
      }
    }
  }

  /**
   * Returns the next byte without consuming it, or `null` at end of input
   */
  async peek(): Promise<number | null> {
    while (this.buffer.length === 0) {
      if (!(await this.fill())) return null;
    }
    return this.buffer[0];
  }

  /**
   * Reads a possibly-folded header line
   *
   * The first line is followed by every immediately following line that
   * starts with a space or tab. A blank line is returned on its own with an
   * empty `unfolded` value.
   *
   * @returns The folded line, or `null` at end of input
   */
  async readFoldedLine(): Promise<FoldedLine | null> {
    const first = await this.readLine();
    if (first === null) return null;

    const folded = [first];
    const unfolded = [trimCRLF(first)];
    if (unfolded[0].length === 0) {
      return { folded, unfolded: unfolded[0] };
    }

    for (;;) {
      const next = await this.peek();
      if (next !== SP && next !== HTAB) break;

      const line = await this.readLine();
      if (line === null) break;
      folded.push(line);
      unfolded.push(trimCRLF(line));
    }

    return { folded, unfolded: Buffer.concat(unfolded) };
  }

  /**
   * Yields all remaining input: whatever is buffered, then the rest of the
   * source as it arrives
   */
  async *drain(): AsyncGenerator<Buffer> {
    if (this.buffer.length > 0) {
      yield this.take(this.buffer.length);
    }
    while (await this.fill()) {
      if (this.buffer.length > 0) {
        yield this.take(this.buffer.length);
      }
    }
  }

  private take(length: number): Buffer {
    const out = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    this.scanned = 0;
    return out;
  }
}
