/**
 * Rewrite option validation and defaults
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { compileGlobs } from '../policy/media-type-policy.js';
import { ConfigError } from '../types/errors.js';
import type { RewriteOptions, RewriteOptionsInit } from '../types/options.js';
import { createLogger } from './logger.js';

export const DEFAULT_MAX_DEPTH = 64;

const rewriteOptionsSchema = z.object({
  deleteMediaTypes: z.array(z.string().min(1)).default([]),
  keepMediaTypes: z.array(z.string().min(1)).default([]),
  now: z.date().optional(),
  timeZoneOffset: z.number().int().min(-1439).max(1439).optional(),
  decodeSubject: z.boolean().default(false),
  strict: z.boolean().default(false),
  verbose: z.boolean().default(false),
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
});

/**
 * Validates caller-supplied options and compiles their globs
 *
 * @throws ConfigError for invalid values or malformed globs
 */
export function createRewriteOptions(init: RewriteOptionsInit = {}): RewriteOptions {
  const { logger, ...rest } = init;
  const parsed = rewriteOptionsSchema.safeParse(rest);

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const [option] = Object.keys(fieldErrors);
    const details = Object.entries(fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid rewrite options: ${details}`, option);
  }

  const opts = parsed.data;
  const now = opts.now ?? new Date();

  return Object.freeze({
    deleteMediaTypes: Object.freeze(compileGlobs(opts.deleteMediaTypes)),
    keepMediaTypes: Object.freeze(compileGlobs(opts.keepMediaTypes)),
    now,
    timeZoneOffset: opts.timeZoneOffset ?? -now.getTimezoneOffset(),
    decodeSubject: opts.decodeSubject,
    strict: opts.strict,
    verbose: opts.verbose,
    maxDepth: opts.maxDepth,
    logger: logger ?? createLogger({ verbose: opts.verbose }),
  });
}

/**
 * Splits a comma-separated list, trimming items and dropping empty ones
 */
export function splitList(list: string | undefined): string[] {
  if (!list) return [];
  return list
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
