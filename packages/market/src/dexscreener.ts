import type { Logger, PriceSnapshot } from "@qtrader/core";

export interface PriceOracle {
  getPrice(mint: string): Promise<PriceSnapshot | null>;
}

interface DexScreenerPair {
  chainId?: string;
  priceUsd?: string;
  baseToken?: { address?: string; symbol?: string };
  quoteToken?: { address?: string; symbol?: string };
  volume?: { h24?: number | string };
  liquidity?: { usd?: number | string };
}

function toNumber(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export class DexScreenerClient implements PriceOracle {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;

  public constructor(baseUrl: string, timeoutMs: number, logger?: Logger) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  /**
   * Most liquid Solana pair for the token. `null` when no pair exists or the
   * reported price or liquidity is not positive.
   */
  public async getPrice(mint: string): Promise<PriceSnapshot | null> {
    const url = `${this.baseUrl}/latest/dex/tokens/${encodeURIComponent(mint)}`;
    const response = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`DexScreener token lookup failed (${response.status}): ${body}`);
    }

    const payload = (await response.json()) as { pairs?: DexScreenerPair[] | null };
    const pairs = (payload.pairs ?? []).filter((pair) => pair.chainId === undefined || pair.chainId === "solana");
    if (pairs.length === 0) {
      this.logger?.warn("NO_PAIRS", "WARNING NO TRADING PAIRS FOUND", { mint });
      return null;
    }

    let best = pairs[0];
    for (const pair of pairs) {
      if (best && toNumber(pair.liquidity?.usd) > toNumber(best.liquidity?.usd)) {
        best = pair;
      }
    }
    if (!best) {
      return null;
    }

    const snapshot: PriceSnapshot = {
      mint,
      priceUsd: toNumber(best.priceUsd),
      baseSymbol: String(best.baseToken?.symbol ?? mint.slice(0, 6)),
      quoteSymbol: String(best.quoteToken?.symbol ?? ""),
      volume24hUsd: toNumber(best.volume?.h24),
      liquidityUsd: toNumber(best.liquidity?.usd),
    };
    if (snapshot.priceUsd <= 0 || snapshot.liquidityUsd <= 0) {
      this.logger?.warn("INVALID_PAIR_DATA", "WARNING PAIR HAS NO PRICE OR LIQUIDITY", {
        mint,
        priceUsd: snapshot.priceUsd,
        liquidityUsd: snapshot.liquidityUsd,
      });
      return null;
    }
    return snapshot;
  }
}
