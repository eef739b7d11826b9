import { describe, expect, it } from 'vitest';
import { Backoff } from '../Backoff';
import { RateLimitError, RateLimitExceeded } from '../Errors';

// A clock that only moves when the policy sleeps
function fakeClock() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

function throttled(): never {
  throw new RateLimitError('openai', 'slow down');
}

describe('Backoff', () => {
  it('gives up after seven attempts within the time budget', async () => {
    const clock = fakeClock();
    const backoff = new Backoff({ jitter: false, now: clock.now, sleep: clock.sleep });
    let calls = 0;

    const failure = await backoff.run(async () => {
      calls += 1;
      throttled();
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RateLimitExceeded);
    expect(calls).toBe(7);
    expect(clock.sleeps).toEqual([1000, 2000, 4000, 8000, 16000, 14000]);
    expect(clock.now()).toBeLessThanOrEqual(45_000);
    if (failure instanceof RateLimitExceeded) {
      expect(failure.attempts).toBe(7);
      expect(failure.cause).toBeInstanceOf(RateLimitError);
    }
  });

  it('stops at the time bound before the attempt bound', async () => {
    const clock = fakeClock();
    const backoff = new Backoff({ jitter: false, baseMs: 10_000, maxTries: 100, now: clock.now, sleep: clock.sleep });
    let calls = 0;

    await expect(backoff.run(async () => {
      calls += 1;
      throttled();
    })).rejects.toBeInstanceOf(RateLimitExceeded);

    expect(calls).toBe(4);
    expect(clock.sleeps).toEqual([10_000, 20_000, 15_000]);
  });

  it('returns the result once the call goes through', async () => {
    const clock = fakeClock();
    const backoff = new Backoff({ jitter: false, now: clock.now, sleep: clock.sleep });
    let calls = 0;

    const result = await backoff.run(async () => {
      calls += 1;
      if (calls < 3) {
        throttled();
      }
      return 'done';
    });

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('does not retry other errors', async () => {
    const clock = fakeClock();
    const backoff = new Backoff({ now: clock.now, sleep: clock.sleep });
    const boom = new Error('unauthorized');
    let calls = 0;

    await expect(backoff.run(async () => {
      calls += 1;
      throw boom;
    })).rejects.toBe(boom);

    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('scales the delay by the jitter draw', () => {
    const backoff = new Backoff({ random: () => 0.5 });
    expect(backoff.delayFor(3)).toBe(2000);
    expect(new Backoff({ jitter: false }).delayFor(1)).toBe(1000);
  });
});
