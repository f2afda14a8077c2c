// Exponential backoff helpers shared by providers and the orchestrator

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms: number) =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 5000,
};

/**
 * Per-call retry bookkeeping. Created fresh for every call and discarded afterwards.
 */
export class RetryState {
  attempt = 0;

  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  get baseDelayMs(): number {
    return this.policy.baseDelayMs;
  }

  canRetry(): boolean {
    return this.attempt < this.policy.maxAttempts - 1;
  }

  // base * 2^attempt: 5s, 10s, 20s with the default policy
  nextDelayMs(): number {
    return this.policy.baseDelayMs * 2 ** this.attempt;
  }

  async backoff(sleeper: Sleeper): Promise<number> {
    const delay = this.nextDelayMs();
    await sleeper(delay);
    this.attempt++;
    return delay;
  }
}

/**
 * True when an SDK error carries an HTTP 429 or a textual rate-limit signal.
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 429) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return /\b429\b|RESOURCE_EXHAUSTED|rate limit/i.test(message);
}
