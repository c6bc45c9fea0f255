import { systemClock, type Clock } from "./clock.js";

export type BackoffKind = "linear" | "exponential";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  backoff?: BackoffKind;
  isRetryable?: (error: unknown) => boolean;
  clock?: Clock;
  onRetry?: (info: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
}

export class RetryPolicy {
  public readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly backoff: BackoffKind;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly clock: Clock;
  private readonly onRetry: RetryOptions["onRetry"];

  public constructor(options: RetryOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error("RetryPolicy maxAttempts must be a positive integer");
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.backoff = options.backoff ?? "exponential";
    this.isRetryable = options.isRetryable ?? (() => true);
    this.clock = options.clock ?? systemClock;
    this.onRetry = options.onRetry;
  }

  public delayFor(attempt: number): number {
    if (this.backoff === "linear") {
      return this.baseDelayMs * attempt;
    }
    return this.baseDelayMs * 2 ** (attempt - 1);
  }

  /** Runs `task` until it resolves, a non-retryable error is thrown, or attempts run out. */
  public async execute<T>(task: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown = new Error("Retry task never ran");
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await task(attempt);
      } catch (error) {
        lastError = error;
        if (attempt >= this.maxAttempts || !this.isRetryable(error)) {
          break;
        }
        const delayMs = this.delayFor(attempt);
        this.onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error });
        if (delayMs > 0) {
          await this.clock.sleep(delayMs);
        }
      }
    }
    throw lastError;
  }
}
