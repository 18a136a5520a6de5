/**
 * Property-based tests for the rewrite engine
 *
 * Property 3: Without deletions or subject decoding, any input is copied
 * byte for byte
 * Property 4: Deleted parts are replaced by placeholders and the rest of
 * the structure is kept
 * Property 5: Rewriting a rewritten message changes nothing
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { rewriteMessage, type RewriteStats } from '../../src/rewrite/engine.js';
import type { RewriteOptionsInit } from '../../src/types/options.js';
import { CollectingWritable, placeholder, sourceOf, testOptions } from '../helpers/streams.js';

const DELETE = ['image/*', 'audio/*'];

async function rewrite(
  chunks: Buffer[],
  init: RewriteOptionsInit = {}
): Promise<{ output: Buffer; stats: RewriteStats }> {
  const out = new CollectingWritable();
  const stats = await rewriteMessage(sourceOf(...chunks), out, testOptions(init));
  return { output: out.buffer(), stats };
}

/**
 * Cuts `data` at the given offsets
 */
function split(data: Buffer, cuts: number[]): Buffer[] {
  const points = [...new Set(cuts.map((c) => c % (data.length + 1)))].sort((a, b) => a - b);
  const chunks: Buffer[] = [];
  let start = 0;
  for (const point of points) {
    chunks.push(data.subarray(start, point));
    start = point;
  }
  chunks.push(data.subarray(start));
  return chunks;
}

interface GeneratedPart {
  mediaType: string;
  body: string[];
}

const partArb: fc.Arbitrary<GeneratedPart> = fc.record({
  mediaType: fc.constantFrom('text/plain', 'text/html', 'image/png', 'image/jpeg', 'audio/ogg', 'application/pdf'),
  body: fc.array(
    fc.stringOf(fc.constantFrom(...'abcXYZ019 .:='.split('')), { maxLength: 30 }),
    { maxLength: 5 }
  ),
});

const messageArb = fc.record({
  term: fc.constantFrom('\n', '\r\n'),
  preamble: fc.array(fc.constantFrom('This is a MIME message.', '', 'preamble'), { maxLength: 2 }),
  parts: fc.array(partArb, { minLength: 1, maxLength: 5 }),
  epilogue: fc.array(fc.constantFrom('epilogue', ''), { maxLength: 2 }),
});

type GeneratedMessage = typeof messageArb extends fc.Arbitrary<infer T> ? T : never;

function isDeleted(part: GeneratedPart): boolean {
  return part.mediaType.startsWith('image/') || part.mediaType.startsWith('audio/');
}

function lines(items: string[], term: string): string {
  return items.map((item) => item + term).join('');
}

function render(msg: GeneratedMessage): string {
  const { term } = msg;
  return (
    `From: sender@example.com${term}` +
    `Content-Type: multipart/mixed; boundary="sep"${term}` +
    term +
    lines(msg.preamble, term) +
    msg.parts
      .map((part) => `--sep${term}Content-Type: ${part.mediaType}${term}${term}${lines(part.body, term)}`)
      .join('') +
    `--sep--${term}` +
    lines(msg.epilogue, term)
  );
}

/**
 * What the engine should produce for `msg` when deleting image and audio parts
 */
function expected(msg: GeneratedMessage): string {
  const { term } = msg;
  return (
    `From: sender@example.com${term}` +
    `Content-Type: multipart/mixed; boundary="sep"${term}` +
    term +
    lines(msg.preamble, term) +
    msg.parts
      .map((part) =>
        isDeleted(part)
          ? `--sep${term}${placeholder(term)}Content-Type: ${part.mediaType}${term}${term}`
          : `--sep${term}Content-Type: ${part.mediaType}${term}${term}${lines(part.body, term)}`
      )
      .join('') +
    `--sep--${term}` +
    lines(msg.epilogue, term)
  );
}

describe('Property 3: Identity without deletions', () => {
  it('arbitrary bytes are copied unchanged', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.uint8Array({ maxLength: 300 }),
        fc.array(fc.nat(), { maxLength: 6 }),
        async (bytes, cuts) => {
          const input = Buffer.from(bytes);
          const { output } = await rewrite(split(input, cuts));
          expect(output.equals(input)).toBe(true);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('generated MIME messages are copied unchanged', async () => {
    await fc.assert(
      fc.asyncProperty(messageArb, fc.array(fc.nat(), { maxLength: 6 }), async (msg, cuts) => {
        const input = Buffer.from(render(msg));
        const { output, stats } = await rewrite(split(input, cuts));
        expect(output.toString()).toBe(input.toString());
        expect(stats).toEqual({ deletedParts: 0, addedFields: 0, recovered: false, bytesWritten: input.length });
      }),
      { numRuns: 100 }
    );
  });
});

describe('Property 4: Deletion keeps the MIME structure', () => {
  it('matching parts are replaced and the rest is copied', async () => {
    await fc.assert(
      fc.asyncProperty(messageArb, fc.array(fc.nat(), { maxLength: 6 }), async (msg, cuts) => {
        const { output, stats } = await rewrite(split(Buffer.from(render(msg)), cuts), {
          deleteMediaTypes: DELETE,
        });
        expect(output.toString()).toBe(expected(msg));
        expect(stats.deletedParts).toBe(msg.parts.filter(isDeleted).length);
        expect(stats.recovered).toBe(false);
      }),
      { numRuns: 100 }
    );
  });
});

describe('Property 5: Rewriting is idempotent', () => {
  it('a second pass leaves the output unchanged', async () => {
    await fc.assert(
      fc.asyncProperty(messageArb, async (msg) => {
        const once = await rewrite([Buffer.from(render(msg))], { deleteMediaTypes: DELETE });
        const twice = await rewrite([once.output], { deleteMediaTypes: DELETE });
        expect(twice.output.toString()).toBe(once.output.toString());
        expect(twice.stats.deletedParts).toBe(0);
      }),
      { numRuns: 100 }
    );
  });
});
