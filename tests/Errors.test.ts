import { describe, expect, it } from 'vitest';
import { errorMessage, errorStatus, fail, RateLimitError, rethrowVendorError } from '../Errors';

describe('vendor errors', () => {
  it('turns HTTP 429 into a RateLimitError', () => {
    const sdkError = Object.assign(new Error('Too Many Requests'), { status: 429 });
    try {
      rethrowVendorError('openai', sdkError);
    } catch (error) {
      expect(error).toBeInstanceOf(RateLimitError);
      expect(errorMessage(error)).toBe('openai: Too Many Requests');
      if (error instanceof RateLimitError) {
        expect(error.vendor).toBe('openai');
        expect(error.cause).toBe(sdkError);
      }
    }
    expect.assertions(4);
  });

  it('rethrows everything else unchanged', () => {
    const sdkError = Object.assign(new Error('Unauthorized'), { status: 401 });
    expect(() => rethrowVendorError('anthropic', sdkError)).toThrow(sdkError);
  });

  it('reads statuses defensively', () => {
    expect(errorStatus({ status: 500 })).toBe(500);
    expect(errorStatus({ status: '500' })).toBeUndefined();
    expect(errorStatus('nope')).toBeUndefined();
  });
});

describe('helpers', () => {
  it('formats unknown errors and fails loudly', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
    expect(() => fail('stop')).toThrow('stop');
  });
});
