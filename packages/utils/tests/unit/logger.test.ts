import { describe, it, expect, vi } from 'vitest';
import { createLogger, winstonLogger } from '../../src/logger.js';

describe('Logger', () => {
  it('adds the namespace and persistent context to every entry', () => {
    const info = vi.spyOn(winstonLogger, 'info');
    const log = createLogger('workflows');
    log.setContext({ category: 'bottle' });

    log.info('Linked 3 train samples', { samples: 3 });

    expect(info).toHaveBeenCalledWith('Linked 3 train samples', {
      namespace: 'workflows',
      category: 'bottle',
      samples: 3,
    });
  });

  it('child loggers inherit context without changing the parent', () => {
    const warn = vi.spyOn(winstonLogger, 'warn');
    const parent = createLogger('cli');
    const child = parent.child({ command: 'dataset.scan' });

    child.warn('slow');
    parent.warn('plain');

    expect(warn).toHaveBeenNthCalledWith(1, 'slow', {
      namespace: 'cli',
      command: 'dataset.scan',
    });
    expect(warn).toHaveBeenNthCalledWith(2, 'plain', { namespace: 'cli' });
  });

  it('serializes Error instances passed to error()', () => {
    const error = vi.spyOn(winstonLogger, 'error');
    const log = createLogger('cli');
    const cause = new Error('disk full');

    log.error('CLI error', cause, { command: 'dataset.materialize' });

    expect(error).toHaveBeenCalledWith('CLI error', {
      namespace: 'cli',
      command: 'dataset.materialize',
      error: { message: 'disk full', stack: cause.stack, name: 'Error' },
    });
  });
});
