export interface RetryOptions {
  /**
   * Number of retries after the first attempt
   *
   * @default 3
   */
  readonly maxRetries?: number;

  /**
   * Delay before the first retry, in milliseconds
   *
   * @default 1000
   */
  readonly initialDelayMs?: number;

  /**
   * @default 30000
   */
  readonly maxDelayMs?: number;

  /**
   * Only errors for which this returns true are retried
   *
   * @default every error
   */
  readonly shouldRetry?: (error: unknown, attempt: number) => boolean;

  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  /**
   * Replaceable for tests
   */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Retries an async operation with exponential backoff
 */
export class Retry {
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  private readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.shouldRetry = options.shouldRetry ?? (() => true);
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? ((ms) => new Promise((ok) => setTimeout(ok, ms)));
  }

  public async execute<A>(fn: (attempt: number) => Promise<A>): Promise<A> {
    let attempt = 0;
    while (true) {
      try {
        return await fn(attempt);
      } catch (e) {
        attempt += 1;
        if (attempt > this.maxRetries || !this.shouldRetry(e, attempt)) {
          throw e;
        }

        const delay = this.delayFor(attempt);
        this.onRetry?.(e, attempt, delay);
        await this.sleep(delay);
      }
    }
  }

  private delayFor(attempt: number) {
    return Math.min(this.initialDelayMs * Math.pow(2, attempt - 1), this.maxDelayMs);
  }
}
