import { RateLimitError, RateLimitExceeded } from './Errors';
import { silentLogger, type Logger } from './Log';

export interface BackoffOptions {
  maxTries?: number;
  maxTimeMs?: number;
  baseMs?: number;
  factor?: number;
  jitter?: boolean;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
}

export const DEFAULT_MAX_TRIES = 7;
export const DEFAULT_MAX_TIME_MS = 45_000;

// Sleeps for a short period
async function sleepMs(ms: number): Promise<void> {
  if (ms <= 0) {
    return;
  }
  await new Promise<void>(resolve => setTimeout(resolve, ms));
}

/**
 * Exponential backoff for throttled model calls.
 *
 * Only `RateLimitError` is retried. The loop stops at whichever bound is hit
 * first: `maxTries` attempts in total, or `maxTimeMs` since the first attempt.
 */
export class Backoff {
  private readonly maxTries: number;
  private readonly maxTimeMs: number;
  private readonly baseMs: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.maxTries = options.maxTries ?? DEFAULT_MAX_TRIES;
    this.maxTimeMs = options.maxTimeMs ?? DEFAULT_MAX_TIME_MS;
    this.baseMs = options.baseMs ?? 1_000;
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter ?? true;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleepMs;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  // Wait before the retry that follows `attempt` failed tries
  delayFor(attempt: number): number {
    const ceiling = this.baseMs * Math.pow(this.factor, attempt - 1);
    return this.jitter ? this.random() * ceiling : ceiling;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const state = { attempt: 0, startedAt: this.now() };

    while (true) {
      state.attempt += 1;
      try {
        return await operation();
      } catch (error) {
        if (!(error instanceof RateLimitError)) {
          throw error;
        }

        const elapsed = this.now() - state.startedAt;
        if (state.attempt >= this.maxTries || elapsed >= this.maxTimeMs) {
          throw new RateLimitExceeded(state.attempt, elapsed, error);
        }

        const wait = Math.min(this.delayFor(state.attempt), this.maxTimeMs - elapsed);
        this.logger.warn(
          `Rate limited (attempt ${state.attempt}/${this.maxTries}); retrying in ${Math.round(wait)} ms`,
        );
        await this.sleep(wait);
      }
    }
  }
}
