import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../Log';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes info lines and hides debug unless verbose', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = createLogger({ color: false });
    logger.info('hello');
    logger.debug('hidden');

    expect(out.mock.calls).toEqual([['[scaffold] hello']]);
  });

  it('prints debug lines when verbose and sends warnings to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger({ prefix: 'test', verbose: true, color: false });
    logger.debug('details');
    logger.warn('careful');
    logger.error('broken');

    expect(out.mock.calls).toEqual([['[test] details']]);
    expect(err.mock.calls).toEqual([['[test] careful'], ['[test] broken']]);
  });
});
