import {
  InsufficientBalanceError,
  RetryPolicy,
  WSOL_MINT,
  isTransientError,
  systemClock,
  type Clock,
  type Logger,
  type Mode,
  type SellReason,
  type TxHandle,
} from "@qtrader/core";
import { parseRouteSummary, type SwapAggregator } from "@qtrader/jupiter";
import { fractionOfAtomic, uiToAtomic, type TradingWallet } from "@qtrader/solana";

export interface ExecutionGatewayOptions {
  aggregator: SwapAggregator;
  /** Required in live mode; paper mode only quotes. */
  wallet: TradingWallet | null;
  mode: Mode;
  slippageBps: number;
  maxAttempts: number;
  baseBackoffMs: number;
  priorityFeeLamports: number;
  logger: Logger;
  clock?: Clock;
}

interface SwapInput {
  side: TxHandle["side"];
  mint: string;
  inputMint: string;
  outputMint: string;
  amountRaw: string;
}

/**
 * Quotes and submits swaps against SOL. Failures come back as `null` after the
 * retry budget; position bookkeeping belongs to the caller.
 */
export class ExecutionGateway {
  private readonly options: ExecutionGatewayOptions;
  private readonly clock: Clock;
  private readonly retry: RetryPolicy;

  public constructor(options: ExecutionGatewayOptions) {
    if (options.mode === "live" && !options.wallet) {
      throw new Error("LIVE mode requires loaded wallet");
    }
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.retry = new RetryPolicy({
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.baseBackoffMs,
      backoff: "exponential",
      isRetryable: isTransientError,
      clock: this.clock,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
        options.logger.warn("EXEC_RETRY", "WARNING EXECUTION ATTEMPT FAILED", {
          attempt,
          maxAttempts,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        }),
    });
  }

  public async buy(mint: string, solAmount: number): Promise<TxHandle | null> {
    const amountRaw = uiToAtomic(solAmount, 9);
    if (BigInt(amountRaw) <= 0n) {
      this.options.logger.warn("BUY_SKIP", "WARNING BUY AMOUNT ROUNDS TO ZERO", { mint, solAmount });
      return null;
    }

    try {
      const wallet = this.options.mode === "live" ? this.options.wallet : null;
      if (wallet) {
        const available = await wallet.solBalance();
        if (available < solAmount) {
          throw new InsufficientBalanceError(solAmount, available);
        }
      }
      return await this.swap({ side: "BUY", mint, inputMint: WSOL_MINT, outputMint: mint, amountRaw });
    } catch (error) {
      this.logFailure("BUY", mint, error);
      return null;
    }
  }

  /**
   * Sells `fraction` of the holding. Live mode sizes from the on-chain token
   * balance; paper mode from `heldRaw`.
   */
  public async sell(mint: string, fraction: number, reason: SellReason, heldRaw: string): Promise<TxHandle | null> {
    if (!(fraction > 0 && fraction <= 1)) {
      this.options.logger.warn("SELL_SKIP", "WARNING SELL FRACTION OUT OF RANGE", { mint, fraction, reason });
      return null;
    }

    try {
      const wallet = this.options.mode === "live" ? this.options.wallet : null;
      const baseRaw = wallet ? await wallet.tokenBalanceRaw(mint) : heldRaw;
      const amountRaw = fractionOfAtomic(baseRaw, fraction);
      if (BigInt(amountRaw) <= 0n) {
        this.options.logger.warn("SELL_SKIP", "WARNING NOTHING TO SELL", { mint, reason, baseRaw });
        return null;
      }
      this.options.logger.info("SELL", "SELL REQUESTED", { mint, reason, fraction, amountRaw });
      return await this.swap({ side: "SELL", mint, inputMint: mint, outputMint: WSOL_MINT, amountRaw });
    } catch (error) {
      this.logFailure("SELL", mint, error);
      return null;
    }
  }

  private swap(input: SwapInput): Promise<TxHandle> {
    return this.retry.execute(async (attempt) => {
      const quote = await this.options.aggregator.getQuote({
        inputMint: input.inputMint,
        outputMint: input.outputMint,
        amount: input.amountRaw,
        slippageBps: this.options.slippageBps,
      });
      const routeSummary = parseRouteSummary(quote);
      this.options.logger.info("GET_QUOTE", "GET QUOTE", {
        side: input.side,
        mint: input.mint,
        inAmountRaw: input.amountRaw,
        expectedOutRaw: quote.outAmount,
        priceImpactPct: quote.priceImpactPct,
        routeSummary,
        attempt,
      });

      const handle: TxHandle = {
        side: input.side,
        mint: input.mint,
        signature: null,
        inAmountRaw: input.amountRaw,
        expectedOutRaw: quote.outAmount,
        routeSummary,
        submittedAt: this.clock.now(),
      };

      const wallet = this.options.mode === "live" ? this.options.wallet : null;
      if (!wallet) {
        this.options.logger.ok("WOULD_TRADE", "PAPER MODE WOULD EXECUTE SWAP", {
          side: input.side,
          mint: input.mint,
          inAmountRaw: input.amountRaw,
          outAmountRaw: quote.outAmount,
        });
        return handle;
      }

      const swapResponse = await this.options.aggregator.getSwapTransaction({
        userPublicKey: wallet.publicKey,
        quoteResponse: quote,
        priorityFeeLamports: this.options.priorityFeeLamports,
      });
      const signature = await wallet.signAndSend(swapResponse.swapTransaction);
      return { ...handle, signature, submittedAt: this.clock.now() };
    });
  }

  private logFailure(side: TxHandle["side"], mint: string, error: unknown): void {
    const code = error instanceof InsufficientBalanceError ? "INSUFFICIENT_BALANCE" : "EXEC_FAIL";
    this.options.logger.error(code, `${side} EXECUTION GAVE UP`, {
      mint,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
