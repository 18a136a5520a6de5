/**
 * Message rewrite engine
 *
 * Walks the header and MIME structure of one message in a single forward
 * pass and copies it to the output. Everything is copied byte for byte
 * except for two kinds of synthesized lines: the placeholder that replaces
 * the Content-Type of a deleted part, and `X-Rendmail-Subject` fields.
 *
 * Each part goes through the same states: its header is copied by
 * {@link MessageRewriter.copyHeader}; a multipart body is then copied as a
 * preamble followed by nested parts (recursively) up to the closing
 * delimiter; finally the rest of the body (the epilogue, or the whole body
 * of a non-multipart or deleted part) is copied up to the enclosing
 * delimiter.
 *
 * @packageDocumentation
 */

import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import { MessageReader, type ByteSource } from '../reader/message-reader.js';
import { parseHeaderField, type HeaderField } from '../mime/header-field.js';
import {
  DEFAULT_CONTENT_TYPE,
  MediaTypeParseError,
  isMultipart,
  parseMediaType,
  type ContentType,
} from '../mime/content-type.js';
import { decodeHeaderValue } from '../mime/transliterate.js';
import { shouldDelete } from '../policy/media-type-policy.js';
import { MessageFormatError, isRewriteError } from '../types/errors.js';
import type { RewriteOptions } from '../types/options.js';
import { OutputSink } from './output-sink.js';
import { decodedSubjectField, deletionPlaceholder } from './placeholder.js';

/**
 * What a rewrite did
 */
export interface RewriteStats {
  /** Body parts replaced by a deletion placeholder */
  deletedParts: number;
  /** `X-Rendmail-Subject` fields added */
  addedFields: number;
  /** True if a format error was hit and the rest was copied verbatim */
  recovered: boolean;
  /** Bytes written to the output */
  bytesWritten: number;
}

/**
 * Header information that controls how a part's body is copied
 */
interface HeaderData {
  contentType: ContentType;
  deletePart: boolean;
}

const DASH_DASH = Buffer.from('--', 'latin1');

function startsWith(line: Buffer, prefix: Buffer): boolean {
  return line.length >= prefix.length && line.subarray(0, prefix.length).equals(prefix);
}

function endsWithCRLF(line: Buffer): boolean {
  return line.length >= 2 && line[line.length - 2] === 0x0d && line[line.length - 1] === 0x0a;
}

/**
 * Rewrites one message from a reader to a sink
 */
export class MessageRewriter {
  private readonly reader: MessageReader;
  private readonly sink: OutputSink;
  private readonly options: RewriteOptions;
  private readonly logger: Logger;
  private readonly stats: Omit<RewriteStats, 'bytesWritten'> = {
    deletedParts: 0,
    addedFields: 0,
    recovered: false,
  };

  constructor(reader: MessageReader, sink: OutputSink, options: RewriteOptions) {
    this.reader = reader;
    this.sink = sink;
    this.options = options;
    this.logger = options.logger;
  }

  /**
   * Copies the whole message, applying the strict/lenient policy to
   * format errors
   *
   * @throws TransportError always; MessageFormatError in strict mode
   */
  async run(): Promise<RewriteStats> {
    try {
      await this.copyMessagePart('', 0);
    } catch (err) {
      if (!isRewriteError(err)) throw err;

      switch (err.kind) {
        case 'transport':
          throw err;
        case 'format':
          if (this.options.strict) throw err;
          // Structure is unknown from here on; keep the remaining bytes
          this.logger.info({ err: err.message }, 'Ignoring error');
          for await (const chunk of this.reader.drain()) {
            await this.sink.write(chunk);
          }
          this.stats.recovered = true;
          break;
        default: {
          const unexpected: never = err;
          throw unexpected;
        }
      }
    }
    return { ...this.stats, bytesWritten: this.sink.bytesWritten };
  }

  /**
   * Copies a part: a header, a blank line and a body. The part is either
   * the whole message (`delim` empty) or a body part ended by `delim`.
   *
   * @param delim - Enclosing boundary delimiter, e.g. `--b1`
   * @param depth - Multipart nesting level of this part
   * @returns True if the part ended with a closing delimiter (`--b1--`) or,
   * at top level, at end of input
   */
  private async copyMessagePart(delim: string, depth: number): Promise<boolean> {
    const header = await this.copyHeader();

    if (isMultipart(header.contentType) && !header.deletePart) {
      // RFC 2046 5.1.1 limits boundaries to 70 characters, but longer ones
      // occur in real mail, so only emptiness is checked.
      const boundary = header.contentType.params.get('boundary') ?? '';
      if (boundary === '') {
        throw new MessageFormatError(`invalid boundary ${JSON.stringify(boundary)}`);
      }
      if (depth >= this.options.maxDepth) {
        throw new MessageFormatError(`multipart nesting exceeds ${this.options.maxDepth} levels`);
      }
      const subDelim = `--${boundary}`;

      // Preamble, then nested parts until the closing delimiter
      const closed = await this.copyBody(subDelim, false);
      if (!closed) {
        while (!(await this.copyMessagePart(subDelim, depth + 1))) {
          // next part
        }
      }
    }

    return this.copyBody(delim, header.deletePart);
  }

  /**
   * Copies a part's header up to and including the blank line that ends it
   *
   * @throws MessageFormatError on end of input (no body) or a field without
   * a colon; the offending lines are written first
   */
  private async copyHeader(): Promise<HeaderData> {
    const data: HeaderData = { contentType: DEFAULT_CONTENT_TYPE, deletePart: false };
    let terminator: string | null = null;
    let sawContentType = false;

    for (;;) {
      const line = await this.reader.readFoldedLine();
      if (line === null) {
        throw new MessageFormatError('missing body');
      }

      // The first line decides between CRLF and bare LF for this part
      terminator ??= endsWithCRLF(line.folded[0]) ? '\r\n' : '\n';

      if (line.unfolded.length === 0) {
        await this.sink.write(line.folded[0]);
        return data;
      }

      let field: HeaderField | null = null;
      let fieldError: MessageFormatError | null = null;
      try {
        field = parseHeaderField(line.unfolded);
      } catch (err) {
        // Usually a body line after a missing blank line
        if (!(err instanceof MessageFormatError)) throw err;
        fieldError = err;
      }

      const extraLines: string[] = [];

      if (field?.key === 'Content-Type' && !sawContentType) {
        sawContentType = true;
        data.contentType = this.parseContentType(field.value);
        data.deletePart = shouldDelete(
          data.contentType.mediaType,
          this.options.deleteMediaTypes,
          this.options.keepMediaTypes
        );
        if (data.deletePart) {
          this.logger.info({ mediaType: data.contentType.mediaType }, 'Deleting part');
          this.stats.deletedParts++;
          // The original fields that follow become part of the discarded body
          await this.sink.write(
            deletionPlaceholder(this.options.now, this.options.timeZoneOffset, terminator)
          );
        }
      } else if (field?.key === 'Subject' && this.options.decodeSubject) {
        const raw = field.value.toString('utf-8');
        const decoded = decodeHeaderValue(raw);
        if (decoded.ok && decoded.value !== '' && decoded.value !== raw) {
          extraLines.push(...decodedSubjectField(decoded.value, terminator));
          this.stats.addedFields++;
        }
      }

      await this.sink.writeAll(line.folded);
      await this.sink.writeAll(extraLines);

      if (fieldError !== null) {
        throw fieldError;
      }
    }
  }

  /**
   * Parses the first Content-Type of a part, falling back to the RFC 2045
   * default for invalid values (RFC 2045 5.2)
   */
  private parseContentType(value: Buffer): ContentType {
    const text = value.toString('latin1');
    try {
      return parseMediaType(text);
    } catch (err) {
      if (!(err instanceof MediaTypeParseError)) throw err;
      this.logger.info({ value: text, err: err.message }, 'Ignoring invalid Content-Type');
      return DEFAULT_CONTENT_TYPE;
    }
  }

  /**
   * Copies lines until one starts with `delim`; the delimiter line is
   * always written. For a deleted part the other lines are dropped.
   *
   * @returns True if the delimiter is a closing one (followed by `--`), or
   * if `delim` is empty and the input ended
   * @throws MessageFormatError if the input ends while `delim` is pending
   */
  private async copyBody(delim: string, deletePart: boolean): Promise<boolean> {
    const delimBytes = Buffer.from(delim, 'latin1');

    for (;;) {
      const line = await this.reader.readLine();
      if (line === null) {
        if (delim !== '') {
          // Truncated multipart or a missing closing delimiter
          throw new MessageFormatError(`EOF while looking for delimiter ${JSON.stringify(delim)}`);
        }
        return true;
      }

      const isDelim = delim !== '' && startsWith(line, delimBytes);
      if (!deletePart || isDelim) {
        await this.sink.write(line);
      }
      if (isDelim) {
        return startsWith(line.subarray(delimBytes.length), DASH_DASH);
      }
    }
  }
}

/**
 * Reads an RFC 5322 message from `input` and writes the rewritten message
 * to `output`
 *
 * In lenient mode (the default) a malformed message is copied as far as it
 * could be understood and the remainder is copied verbatim. In strict mode
 * the format error is thrown instead and the output is incomplete.
 *
 * @param input - Message bytes; the source is not closed
 * @param output - Destination; not ended, so the caller can keep writing
 * @param options - Result of `createRewriteOptions`
 * @throws TransportError on input or output failure
 * @throws MessageFormatError in strict mode
 */
export async function rewriteMessage(
  input: ByteSource,
  output: Writable,
  options: RewriteOptions
): Promise<RewriteStats> {
  const sink = new OutputSink(output);
  try {
    return await new MessageRewriter(new MessageReader(input), sink, options).run();
  } finally {
    sink.release();
  }
}
