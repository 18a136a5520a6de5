/**
 * Rewrite Options and Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_DEPTH, createRewriteOptions, splitList } from '../../src/config/options.js';
import { createLogger, silentLogger } from '../../src/config/logger.js';
import { ConfigError } from '../../src/types/errors.js';

function configError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('createRewriteOptions', () => {
  it('should apply defaults', () => {
    const options = createRewriteOptions({ logger: silentLogger });
    expect(options.deleteMediaTypes).toEqual([]);
    expect(options.keepMediaTypes).toEqual([]);
    expect(options.decodeSubject).toBe(false);
    expect(options.strict).toBe(false);
    expect(options.verbose).toBe(false);
    expect(options.maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(options.logger).toBe(silentLogger);
    expect(options.timeZoneOffset).toBe(-options.now.getTimezoneOffset());
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('should compile globs', () => {
    const options = createRewriteOptions({
      deleteMediaTypes: ['image/*'],
      keepMediaTypes: ['image/svg+xml'],
      logger: silentLogger,
    });
    expect(options.deleteMediaTypes.map(String)).toEqual(['image/*']);
    expect(options.deleteMediaTypes[0].matches('image/png')).toBe(true);
    expect(options.keepMediaTypes[0].matches('image/svg+xml')).toBe(true);
  });

  it('should keep an explicit clock and zone', () => {
    const now = new Date('2022-06-01T12:00:00Z');
    const options = createRewriteOptions({ now, timeZoneOffset: 120, logger: silentLogger });
    expect(options.now).toBe(now);
    expect(options.timeZoneOffset).toBe(120);
  });

  it('should reject a malformed glob', () => {
    const err = configError(() => createRewriteOptions({ keepMediaTypes: ['text/[plain'] }));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ message: 'syntax error in pattern "text/[plain"' });
  });

  it('should reject an empty glob', () => {
    const err = configError(() => createRewriteOptions({ deleteMediaTypes: [''] }));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({
      option: 'deleteMediaTypes',
      message: 'Invalid rewrite options: deleteMediaTypes: String must contain at least 1 character(s)',
    });
  });

  it('should reject a non-positive depth limit', () => {
    const err = configError(() => createRewriteOptions({ maxDepth: 0 }));
    expect(err).toMatchObject({
      option: 'maxDepth',
      message: 'Invalid rewrite options: maxDepth: Number must be greater than 0',
    });
  });

  it('should reject an impossible zone offset', () => {
    const err = configError(() => createRewriteOptions({ timeZoneOffset: 24 * 60 }));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ option: 'timeZoneOffset' });
  });
});

describe('splitList', () => {
  it('should trim items and drop empty ones', () => {
    expect(splitList(' image/*, ,audio/* ,')).toEqual(['image/*', 'audio/*']);
    expect(splitList('video/mp4')).toEqual(['video/mp4']);
    expect(splitList('')).toEqual([]);
    expect(splitList(undefined)).toEqual([]);
  });
});

describe('createLogger', () => {
  it('should log informational messages only when verbose', () => {
    const lines: string[] = [];
    const destination = {
      write(msg: string) {
        lines.push(msg);
      },
    };

    const quiet = createLogger({ destination });
    quiet.info('hidden');
    quiet.warn('shown');
    const verbose = createLogger({ verbose: true, destination });
    verbose.info({ mediaType: 'image/png' }, 'Deleting part');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({ name: 'rendmail', msg: 'shown' });
    expect(JSON.parse(lines[1])).toMatchObject({
      name: 'rendmail',
      msg: 'Deleting part',
      mediaType: 'image/png',
    });
  });

  it('should default to warnings only', () => {
    expect(createLogger({ destination: { write() {} } }).level).toBe('warn');
    expect(createLogger({ verbose: true, destination: { write() {} } }).level).toBe('info');
  });
});
