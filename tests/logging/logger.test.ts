import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsoleLogger, MemoryLogger, decodeException, formatMessage } from '../../src/logging/logger.js';

describe('formatMessage', () => {
  it('replaces placeholders from the context', () => {
    expect(formatMessage('Developer %id is @state', { '%id': 'dev-1', '@state': 'gone' })).toBe(
      'Developer dev-1 is gone'
    );
  });

  it('replaces longer keys first', () => {
    expect(formatMessage('%file and %filename', { '%file': 'a.ts', '%filename': 'b.ts' })).toBe(
      'a.ts and b.ts'
    );
  });

  it('leaves placeholder text inside values alone', () => {
    expect(
      formatMessage('Developer %developer failed at line %line', { '%developer': 'a%line@example.com', '%line': 12 })
    ).toBe('Developer a%line@example.com failed at line 12');
  });

  it('ignores keys without a placeholder prefix', () => {
    expect(formatMessage('plain text', { text: 'nope' })).toBe('plain text');
  });

  it('renders undefined values as empty', () => {
    expect(formatMessage('[%value]', { '%value': undefined })).toBe('[]');
  });
});

describe('decodeException', () => {
  it('decodes an error', () => {
    const error = new RangeError('out of range');
    error.stack = [
      'RangeError: out of range',
      '    at checkRange (/srv/portal/src/range.ts:12:7)',
      '    at /srv/portal/src/main.ts:3:1',
    ].join('\n');

    expect(decodeException(error)).toEqual({
      '%type': 'RangeError',
      '@message': 'out of range',
      '%function': 'checkRange()',
      '%file': '/srv/portal/src/range.ts',
      '%line': 12,
      '@backtrace_string': 'at checkRange (/srv/portal/src/range.ts:12:7)\nat /srv/portal/src/main.ts:3:1',
    });
  });

  it('leaves the function empty for anonymous frames', () => {
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at /srv/portal/src/main.ts:3:1';

    const decoded = decodeException(error);

    expect(decoded['%function']).toBe('');
    expect(decoded['%file']).toBe('/srv/portal/src/main.ts');
    expect(decoded['%line']).toBe(3);
  });

  it('decodes thrown non-errors', () => {
    expect(decodeException('just a string')).toEqual({
      '%type': 'string',
      '@message': 'just a string',
      '%function': '',
      '%file': '',
      '%line': 0,
      '@backtrace_string': '',
    });
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the channel', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new ConsoleLogger('portal').warning('Key @key rotated', { '@key': 'k-1' });

    expect(warn).toHaveBeenCalledWith('[portal] Key k-1 rotated');
  });

  it('writes errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger('portal').error('Failed');

    expect(error).toHaveBeenCalledWith('[portal] Failed');
  });
});

describe('MemoryLogger', () => {
  it('keeps entries and formats them by level', () => {
    const logger = new MemoryLogger();

    logger.info('Started on %port', { '%port': 3000 });
    logger.error('Failed %what', { '%what': 'twice' });

    expect(logger.entries).toHaveLength(2);
    expect(logger.entries[0]).toEqual({
      level: 'info',
      channel: 'test',
      message: 'Started on %port',
      context: { '%port': 3000 },
    });
    expect(logger.messages('error')).toEqual(['Failed twice']);
    expect(logger.messages('warning')).toEqual([]);
  });
});
