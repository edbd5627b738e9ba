/**
 * Unit tests for Error Handler
 */

import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, logger } from '@adprep/utils';
import {
  formatError,
  handleError,
  handleFilesystemError,
  logError,
} from '../../src/core/error-handler.js';

function errnoError(code: string, path: string): Error {
  return Object.assign(new Error(`${code}: failed, '${path}'`), { code, path });
}

describe('formatError', () => {
  it('formats Error objects', () => {
    expect(formatError(new NotFoundError('Data root', '/data'))).toBe('Data root not found: /data');
  });

  it('formats string errors', () => {
    expect(formatError('String error')).toBe('String error');
  });

  it('handles unknown error types', () => {
    expect(formatError({ unexpected: 'object' })).toBe('An unexpected error occurred');
  });

  it('sanitizes sensitive information', () => {
    expect(formatError(new Error('api-key is invalid: placeholder'))).toBe(
      'An error occurred. Please check your configuration and try again.'
    );
  });

  it('sanitizes consistently across repeated calls', () => {
    const error = new Error('token rejected');

    expect(formatError(error)).toBe(formatError(error));
  });
});

describe('handleFilesystemError', () => {
  it('explains permission errors', () => {
    expect(handleFilesystemError(errnoError('EACCES', '/out/bottle'))).toBe(
      'Permission denied: /out/bottle. Check directory permissions or use --link-mode copy.'
    );
  });

  it('explains cross-device hard links', () => {
    expect(handleFilesystemError(errnoError('EXDEV', '/out/a.png'))).toBe(
      'Hard links cannot cross filesystems. Use --link-mode symlink or copy.'
    );
  });

  it('falls back to the plain message', () => {
    expect(handleFilesystemError(new Error('something else'))).toBe('something else');
  });
});

describe('logError / handleError', () => {
  it('logs the error and redacts sensitive context values', () => {
    const spy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const error = new Error('boom');

    logError(error, { command: 'dataset.scan', header: 'Bearer placeholder' });

    expect(spy).toHaveBeenCalledWith('CLI error', error, {
      context: { command: 'dataset.scan', header: '[REDACTED]' },
    });
  });

  it('logs non-Error values as strings', () => {
    const spy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);

    logError(42);

    expect(spy).toHaveBeenCalledWith('CLI error', undefined, { error: '42', context: undefined });
  });

  it('returns the user-facing message', () => {
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);

    expect(handleError(new NotFoundError('JSON directory', '/meta'))).toBe(
      'JSON directory not found: /meta'
    );
  });
});
