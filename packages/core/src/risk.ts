import type { Logger } from "./logger.js";

export interface RiskParameters {
  accountValueUsd: number;
  stopLossFraction: number;
}

/** Resolves the USD price of one SOL; may throw or return a non-positive value when unknown. */
export type ReferencePriceSource = () => Promise<number | null>;

export class RiskManager {
  private readonly params: RiskParameters;
  private readonly referencePrice: ReferencePriceSource;
  private readonly logger: Logger | undefined;

  public constructor(params: RiskParameters, referencePrice: ReferencePriceSource, logger?: Logger) {
    if (params.stopLossFraction <= 0 || params.stopLossFraction >= 1) {
      throw new Error("stopLossFraction must be > 0 and < 1");
    }
    this.params = params;
    this.referencePrice = referencePrice;
    this.logger = logger;
  }

  /**
   * SOL amount to commit to one entry. Returns 0 (skip the trade) when the
   * SOL reference price is unavailable.
   */
  public async positionSize(riskFraction: number): Promise<number> {
    if (riskFraction <= 0) {
      return 0;
    }

    let solPriceUsd: number | null;
    try {
      solPriceUsd = await this.referencePrice();
    } catch (error) {
      this.logger?.warn("SOL_PRICE_UNAVAILABLE", "WARNING SOL PRICE FETCH FAILED, SKIPPING SIZE", {
        error: error instanceof Error ? error.message : String(error),
      });
      return 0;
    }
    if (solPriceUsd === null || !Number.isFinite(solPriceUsd) || solPriceUsd <= 0) {
      this.logger?.warn("SOL_PRICE_UNAVAILABLE", "WARNING NO SOL PRICE, SKIPPING SIZE", { solPriceUsd });
      return 0;
    }

    const riskUsd = this.params.accountValueUsd * riskFraction;
    const sizeSol = riskUsd / solPriceUsd;
    this.logger?.debug("POSITION_SIZE", "CALCULATED POSITION SIZE", { riskUsd, solPriceUsd, sizeSol });
    return sizeSol;
  }

  public stopLossPrice(entryPrice: number): number {
    return computeStopLossPrice(entryPrice, this.params.stopLossFraction);
  }

  public checkStopLoss(currentPrice: number, stopLossPrice: number): boolean {
    return isStopLossTriggered(currentPrice, stopLossPrice);
  }
}

export function computeStopLossPrice(entryPrice: number, stopLossFraction: number): number {
  return entryPrice * (1 - stopLossFraction);
}

/** Inclusive: a price sitting exactly on the stop triggers it. */
export function isStopLossTriggered(currentPrice: number, stopLossPrice: number): boolean {
  return currentPrice <= stopLossPrice;
}
