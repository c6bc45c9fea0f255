import {
  FetchError,
  NoLiquidityError,
  type AssetObservation,
  type Clock,
  type Logger,
  type Position,
  type PriceSnapshot,
  type RateLimitedCache,
  type SentimentReading,
  systemClock,
} from "@qtrader/core";
import type { PriceOracle } from "./dexscreener.js";
import { NEUTRAL_SENTIMENT, type SentimentOracle } from "./sentiment.js";
import type { PriceHistory } from "./volatility.js";

export interface SurgeThresholds {
  mentionThreshold: number;
  sentimentThreshold: number;
}

export interface MarketDataGatewayOptions {
  priceOracle: PriceOracle;
  sentimentOracle: SentimentOracle;
  priceCache: RateLimitedCache<PriceSnapshot | null>;
  socialCache: RateLimitedCache<SentimentReading>;
  priceTtlMs: number;
  socialTtlMs: number;
  history: PriceHistory;
  surge: SurgeThresholds;
  logger: Logger;
  clock?: Clock;
}

export function sentimentQuery(symbol: string, mint: string): string {
  return `${symbol} OR ${mint}`;
}

export class MarketDataGateway {
  private readonly options: MarketDataGatewayOptions;
  private readonly clock: Clock;

  public constructor(options: MarketDataGatewayOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Builds the per-tick observation. Throws `NoLiquidityError` before any
   * sentiment lookup when the price data is missing or invalid.
   */
  public async observe(mint: string, position?: Position | null): Promise<AssetObservation> {
    const snapshot = await this.snapshot(mint);
    const reading = await this.sentiment(snapshot.baseSymbol, mint);

    const entry = position?.entryPriceUsd ?? 0;
    const priceChange = position && entry > 0 ? (snapshot.priceUsd - entry) / entry : 0;

    return Object.freeze({
      mint,
      symbol: snapshot.baseSymbol,
      priceUsd: snapshot.priceUsd,
      observedAt: this.clock.now(),
      priceChange,
      sentimentScore: reading.score,
      volume24h: snapshot.volume24hUsd,
      volatility: this.options.history.volatility(mint),
    });
  }

  public async snapshot(mint: string): Promise<PriceSnapshot> {
    const snapshot = await this.options.priceCache.getOrFetch(`price:${mint}`, this.options.priceTtlMs, () =>
      this.fetchSnapshot(mint),
    );
    return this.requireLiquid(mint, snapshot);
  }

  /** `fresh` skips the cache TTL; the price channel spacing still applies. */
  public async currentPrice(mint: string, fresh = false): Promise<number> {
    if (!fresh) {
      return (await this.snapshot(mint)).priceUsd;
    }
    const snapshot = await this.options.priceCache.refresh(`price:${mint}`, () => this.fetchSnapshot(mint));
    return this.requireLiquid(mint, snapshot).priceUsd;
  }

  /** Falls back to a neutral-low reading when the oracle cannot be reached. */
  public async sentiment(symbol: string, mint: string): Promise<SentimentReading> {
    const query = sentimentQuery(symbol, mint);
    try {
      return await this.options.socialCache.getOrFetch(`social:${query}`, this.options.socialTtlMs, () =>
        this.options.sentimentOracle.analyze(query),
      );
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      this.options.logger.warn("SENTIMENT_FALLBACK", "WARNING SENTIMENT UNAVAILABLE, USING NEUTRAL", {
        mint,
        error: error.message,
      });
      return { ...NEUTRAL_SENTIMENT };
    }
  }

  public async detectSurge(mint: string, symbol: string): Promise<boolean> {
    const reading = await this.sentiment(symbol, mint);
    const { mentionThreshold, sentimentThreshold } = this.options.surge;
    const surge = reading.mentions >= mentionThreshold && reading.score >= sentimentThreshold;
    this.options.logger.debug("SURGE_CHECK", surge ? "SURGE POTENTIAL DETECTED" : "NO SURGE POTENTIAL", {
      mint,
      symbol,
      mentions: reading.mentions,
      score: reading.score,
    });
    return surge;
  }

  private async fetchSnapshot(mint: string): Promise<PriceSnapshot | null> {
    const snapshot = await this.options.priceOracle.getPrice(mint);
    if (snapshot && snapshot.priceUsd > 0 && snapshot.liquidityUsd > 0) {
      this.options.history.record(mint, snapshot.priceUsd);
    }
    return snapshot;
  }

  private requireLiquid(mint: string, snapshot: PriceSnapshot | null): PriceSnapshot {
    if (!snapshot || snapshot.priceUsd <= 0 || snapshot.liquidityUsd <= 0) {
      throw new NoLiquidityError(mint);
    }
    return snapshot;
  }
}
