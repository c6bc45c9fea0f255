import type { Connection } from "@solana/web3.js";
import {
  RetryPolicy,
  TransactionFailedError,
  systemClock,
  withTimeout,
  type Clock,
  type Logger,
  type PendingTransaction,
  type RateLimiter,
  type TxStatus,
} from "@qtrader/core";

export type ConfirmationLevel = "processed" | "confirmed" | "finalized";

export interface SignatureStatusView {
  confirmationStatus: ConfirmationLevel | null;
  err: unknown;
}

/** Read side of the chain used to poll submitted signatures. */
export interface SignatureStatusSource {
  getStatus(signature: string): Promise<SignatureStatusView | null>;
}

export function rpcSignatureStatusSource(connection: Connection): SignatureStatusSource {
  return {
    async getStatus(signature) {
      const response = await connection.getSignatureStatus(signature, { searchTransactionHistory: true });
      const value = response.value;
      if (!value) {
        return null;
      }
      return { confirmationStatus: value.confirmationStatus ?? null, err: value.err };
    },
  };
}

export interface TxResolution {
  signature: string;
  mint: string;
  status: Exclude<TxStatus, "SUBMITTED">;
  attempts: number;
  error?: string;
}

export type TxAlertHandler = (resolution: TxResolution) => void;

export interface TxConfirmationMonitorOptions {
  source: SignatureStatusSource;
  limiter: RateLimiter;
  maxAttempts: number;
  baseDelayMs: number;
  /** Bound on a single status query. */
  requestTimeoutMs: number;
  logger: Logger;
  clock?: Clock;
  onAlert?: TxAlertHandler;
}

class NotFinalizedError extends Error {
  public constructor(signature: string, level: ConfirmationLevel | null) {
    super(`Transaction ${signature} not finalized (${level ?? "not found"})`);
    this.name = "NotFinalizedError";
  }
}

/**
 * Polls submitted signatures until they reach finalized commitment. Exhausting
 * the attempts or an on-chain error resolves to FAILED and raises an alert.
 */
export class TxConfirmationMonitor {
  private readonly source: SignatureStatusSource;
  private readonly limiter: RateLimiter;
  private readonly retry: RetryPolicy;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly onAlert: TxAlertHandler | undefined;
  private readonly inFlight = new Map<string, PendingTransaction>();

  public constructor(options: TxConfirmationMonitorOptions) {
    this.source = options.source;
    this.limiter = options.limiter;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.onAlert = options.onAlert;
    this.retry = new RetryPolicy({
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.baseDelayMs,
      backoff: "linear",
      clock: this.clock,
      isRetryable: (error) => !(error instanceof TransactionFailedError),
      onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
        this.logger.debug("TX_PENDING", "TX NOT FINALIZED YET", {
          attempt,
          maxAttempts,
          delayMs,
          reason: error instanceof Error ? error.message : String(error),
        }),
    });
  }

  public pending(): PendingTransaction[] {
    return [...this.inFlight.values()];
  }

  public async confirm(signature: string, mint: string): Promise<TxResolution> {
    this.inFlight.set(signature, { signature, mint, submittedAt: this.clock.now() });
    let attempts = 0;
    try {
      await this.retry.execute(async (attempt) => {
        attempts = attempt;
        await this.limiter.acquire();
        const status = await withTimeout(
          this.source.getStatus(signature),
          this.requestTimeoutMs,
          `Status query for ${signature}`,
        );
        if (status?.err) {
          throw new TransactionFailedError(signature, JSON.stringify(status.err));
        }
        if (status?.confirmationStatus !== "finalized") {
          throw new NotFinalizedError(signature, status?.confirmationStatus ?? null);
        }
      });
    } catch (error) {
      const resolution: TxResolution = {
        signature,
        mint,
        status: "FAILED",
        attempts,
        error: error instanceof Error ? error.message : String(error),
      };
      this.logger.error("TX_FAILED", "ALERT TRANSACTION NOT CONFIRMED", { ...resolution });
      this.onAlert?.(resolution);
      return resolution;
    } finally {
      this.inFlight.delete(signature);
    }

    this.logger.ok("TX_CONFIRMED", "TRANSACTION FINALIZED", { signature, mint, attempts });
    return { signature, mint, status: "CONFIRMED", attempts };
  }
}
