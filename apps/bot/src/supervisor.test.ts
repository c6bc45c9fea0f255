import { describe, expect, it } from "vitest";
import {
  Logger,
  NoRouteFoundError,
  RateLimitedCache,
  RateLimiter,
  RiskManager,
  USDC_MINT,
  WSOL_MINT,
  type Action,
  type Clock,
  type LogEntry,
  type Mode,
  type Observation,
  type PriceSnapshot,
  type SentimentReading,
} from "@qtrader/core";
import type { JupiterQuoteRequest, JupiterQuoteResponse, JupiterSwapResponse, SwapAggregator } from "@qtrader/jupiter";
import { MarketDataGateway, PriceHistory, type PriceOracle, type SentimentOracle } from "@qtrader/market";
import { PolicyEngine, QTable } from "@qtrader/policy";
import { TxConfirmationMonitor, type SignatureStatusView, type TradingWallet } from "@qtrader/solana";
import { ExecutionGateway } from "./execution.js";
import { TradingSupervisor } from "./supervisor.js";

const ASSET = USDC_MINT;
const OTHER = "11111111111111111111111111111111";

class ManualClock implements Clock {
  public current = 0;

  public now(): number {
    return this.current;
  }

  public async sleep(ms: number): Promise<void> {
    this.current += ms;
  }
}

class FakePriceOracle implements PriceOracle {
  public readonly calls: string[] = [];
  private readonly snapshots = new Map<string, PriceSnapshot | Error>();

  public set(mint: string, priceUsd: number, liquidityUsd = 50_000): void {
    this.snapshots.set(mint, {
      mint,
      priceUsd,
      baseSymbol: "TKN",
      quoteSymbol: "SOL",
      volume24hUsd: 500,
      liquidityUsd,
    });
  }

  public fail(mint: string, error: Error): void {
    this.snapshots.set(mint, error);
  }

  public async getPrice(mint: string): Promise<PriceSnapshot | null> {
    this.calls.push(mint);
    const snapshot = this.snapshots.get(mint);
    if (snapshot instanceof Error) {
      throw snapshot;
    }
    return snapshot ?? null;
  }
}

class FakeSentimentOracle implements SentimentOracle {
  public reading: SentimentReading = { score: 0, mentions: 0 };
  public calls = 0;

  public async analyze(): Promise<SentimentReading> {
    this.calls += 1;
    return { ...this.reading };
  }
}

class FakeAggregator implements SwapAggregator {
  public readonly quotes: JupiterQuoteRequest[] = [];
  public failure: Error | null = null;
  public outAmount = "5000";

  public async getQuote(request: JupiterQuoteRequest): Promise<JupiterQuoteResponse> {
    this.quotes.push(request);
    if (this.failure) {
      throw this.failure;
    }
    return {
      inputMint: request.inputMint,
      outputMint: request.outputMint,
      inAmount: request.amount,
      outAmount: this.outAmount,
      otherAmountThreshold: "4900",
      swapMode: "ExactIn",
      slippageBps: request.slippageBps,
      priceImpactPct: "0",
      routePlan: [
        {
          percent: 100,
          swapInfo: {
            ammKey: "amm",
            label: "Raydium",
            inputMint: request.inputMint,
            outputMint: request.outputMint,
            inAmount: request.amount,
            outAmount: this.outAmount,
          },
        },
      ],
    };
  }

  public async getSwapTransaction(): Promise<JupiterSwapResponse> {
    return { swapTransaction: "c2VyaWFsaXplZA==", lastValidBlockHeight: 1 };
  }
}

class FakeWallet implements TradingWallet {
  public readonly publicKey = "wallet-pubkey";
  public tokens = "5000";
  private sent = 0;

  public async solBalance(): Promise<number> {
    return 10;
  }

  public async tokenBalanceRaw(): Promise<string> {
    return this.tokens;
  }

  public async signAndSend(): Promise<string> {
    this.sent += 1;
    return `sig-${this.sent}`;
  }
}

/** Policy whose choice is set by the test; learning still goes through the real table. */
class ScriptedPolicy extends PolicyEngine {
  public next: Action = "buy";

  public override selectAction(): Action {
    return this.next;
  }
}

interface HarnessOptions {
  mode?: Mode;
  assets?: string[];
  solPriceUsd?: number | null;
  finality?: SignatureStatusView["confirmationStatus"];
  onlineLearning?: boolean;
}

function harness(options: HarnessOptions = {}) {
  const clock = new ManualClock();
  const entries: LogEntry[] = [];
  const logger = new Logger({
    component: "TEST",
    level: "DEBUG",
    silent: true,
    sink: { write: (entry) => void entries.push(entry) },
  });
  const prices = new FakePriceOracle();
  const sentiment = new FakeSentimentOracle();
  const aggregator = new FakeAggregator();
  const wallet = new FakeWallet();
  const mode = options.mode ?? "paper";
  const solPriceUsd = options.solPriceUsd === undefined ? 50 : options.solPriceUsd;
  const alerts: string[] = [];

  const market = new MarketDataGateway({
    priceOracle: prices,
    sentimentOracle: sentiment,
    priceCache: new RateLimitedCache<PriceSnapshot | null>({ limiter: new RateLimiter(0, clock), clock }),
    socialCache: new RateLimitedCache<SentimentReading>({ limiter: new RateLimiter(0, clock), clock }),
    priceTtlMs: 0,
    socialTtlMs: 0,
    history: new PriceHistory(20),
    surge: { mentionThreshold: 200, sentimentThreshold: 0.7 },
    logger,
    clock,
  });
  const policy = new ScriptedPolicy({ table: new QTable(10_000), params: { initialEpsilon: 0 }, clock, logger });
  const risk = new RiskManager({ accountValueUsd: 100, stopLossFraction: 0.1 }, async () => solPriceUsd, logger);
  const execution = new ExecutionGateway({
    aggregator,
    wallet: mode === "live" ? wallet : null,
    mode,
    slippageBps: 50,
    maxAttempts: 3,
    baseBackoffMs: 400,
    priorityFeeLamports: 0,
    logger,
    clock,
  });
  const monitor = new TxConfirmationMonitor({
    source: { getStatus: async () => ({ confirmationStatus: options.finality ?? "finalized", err: null }) },
    limiter: new RateLimiter(0, clock),
    maxAttempts: 2,
    baseDelayMs: 1000,
    requestTimeoutMs: 1000,
    logger,
    clock,
    onAlert: (resolution) => alerts.push(resolution.signature),
  });
  const supervisor = new TradingSupervisor({
    assets: options.assets ?? [ASSET],
    market,
    policy,
    risk,
    execution,
    monitor,
    riskFraction: 0.02,
    takeProfitFraction: 0.45,
    surgeSellFraction: 0.25,
    onlineLearning: options.onlineLearning ?? true,
    logger,
    clock,
  });

  return { supervisor, prices, sentiment, aggregator, policy, entries, alerts };
}

describe("TradingSupervisor", () => {
  it("opens a position at the observed price when the policy buys", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);

    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("Open");
    expect(h.supervisor.position(ASSET)).toEqual({ mint: ASSET, entryPriceUsd: 1, quantityRaw: "5000", openedAt: 0 });
    expect(h.aggregator.quotes[0]?.amount).toBe("40000000");
  });

  it("stays flat when the policy holds", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    h.policy.next = "hold";

    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes).toEqual([]);
  });

  it("skips an asset without liquidity before asking for sentiment", async () => {
    const h = harness();
    h.prices.set(ASSET, 1, 0);

    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.sentiment.calls).toBe(0);
    expect(h.aggregator.quotes).toEqual([]);
    expect(h.entries.filter((entry) => entry.code === "DATA_SKIP")).toHaveLength(1);
  });

  it("skips an invalid address permanently and logs it once", async () => {
    const h = harness({ assets: ["not-a-mint", ASSET] });
    h.prices.set(ASSET, 1);

    await h.supervisor.tick();
    await h.supervisor.tick();

    expect(h.entries.filter((entry) => entry.code === "INVALID_ASSET")).toHaveLength(1);
    expect(h.prices.calls).not.toContain("not-a-mint");
    expect(h.supervisor.skippedAssets()).toEqual(["not-a-mint"]);
    expect(h.supervisor.state(ASSET)).toBe("Open");
  });

  it("isolates a failing asset from the others in the same tick", async () => {
    const h = harness({ assets: [OTHER, ASSET] });
    h.prices.fail(OTHER, new Error("socket hang up"));
    h.prices.set(ASSET, 1);

    await h.supervisor.tick();

    expect(h.supervisor.state(OTHER)).toBe("NoPosition");
    expect(h.supervisor.state(ASSET)).toBe("Open");
  });

  it("does not open a position when execution gives up", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    h.aggregator.failure = new NoRouteFoundError(WSOL_MINT, ASSET);

    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes).toHaveLength(3);
  });

  it("skips the buy when the reference price is unavailable", async () => {
    const h = harness({ solPriceUsd: null });
    h.prices.set(ASSET, 1);

    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes).toEqual([]);
  });

  it("sells everything on stop-loss regardless of the policy", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();

    h.policy.next = "buy";
    h.prices.set(ASSET, 0.9);
    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes[1]).toEqual({ inputMint: ASSET, outputMint: WSOL_MINT, amount: "5000", slippageBps: 50 });
  });

  it("moves to surge-hold without trading, then takes partial exits at the same entry", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();

    h.sentiment.reading = { score: 0.9, mentions: 300 };
    h.policy.next = "sell";
    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("OpenHold");
    expect(h.aggregator.quotes).toHaveLength(1);

    h.prices.set(ASSET, 1.05);
    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("OpenHold");
    expect(h.aggregator.quotes[1]?.amount).toBe("1250");
    expect(h.supervisor.position(ASSET)).toEqual({ mint: ASSET, entryPriceUsd: 1, quantityRaw: "3750", openedAt: 0 });
  });

  it("sells the remainder once a partial exit would round to nothing", async () => {
    const h = harness();
    h.aggregator.outAmount = "5";
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();
    h.sentiment.reading = { score: 0.9, mentions: 300 };
    await h.supervisor.tick();

    await h.supervisor.tick();
    expect(h.supervisor.position(ASSET)?.quantityRaw).toBe("4");

    await h.supervisor.tick();
    expect(h.supervisor.position(ASSET)?.quantityRaw).toBe("3");

    await h.supervisor.tick();
    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes.map((quote) => quote.amount)).toEqual(["40000000", "1", "1", "3"]);
    expect(h.entries.filter((entry) => entry.code === "SELL_SKIP")).toEqual([]);
  });

  it("lets stop-loss dominate surge-hold", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();
    h.sentiment.reading = { score: 0.9, mentions: 300 };
    await h.supervisor.tick();

    h.prices.set(ASSET, 0.85);
    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes[1]?.amount).toBe("5000");
  });

  it("takes profit ahead of the policy", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();

    h.policy.next = "hold";
    h.prices.set(ASSET, 1.5);
    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.entries.some((entry) => entry.code === "TAKE_PROFIT")).toBe(true);
  });

  it("closes on a policy sell", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();

    h.policy.next = "sell";
    h.prices.set(ASSET, 1.1);
    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.aggregator.quotes[1]?.amount).toBe("5000");
  });

  it("keeps position state unchanged when confirmation fails", async () => {
    const h = harness({ mode: "live", finality: "confirmed" });
    h.prices.set(ASSET, 1);

    await h.supervisor.tick();

    expect(h.supervisor.state(ASSET)).toBe("NoPosition");
    expect(h.alerts).toEqual(["sig-1"]);
  });

  it("opens a live position once the buy is finalized", async () => {
    const h = harness({ mode: "live" });
    h.prices.set(ASSET, 2);

    await h.supervisor.tick();

    expect(h.supervisor.position(ASSET)?.entryPriceUsd).toBe(2);
    expect(h.alerts).toEqual([]);
  });

  it("learns from the realised move of the previous decision", async () => {
    const h = harness();
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();

    h.policy.next = "hold";
    h.prices.set(ASSET, 1.1);
    await h.supervisor.tick();

    const firstObservation: Observation = { priceChange: 0, sentimentScore: 0, volume24h: 500, volatility: 0 };
    expect(h.policy.values(firstObservation).buy).toBeCloseTo(0.1, 10);
  });

  it("does not learn online when disabled", async () => {
    const h = harness({ onlineLearning: false });
    h.prices.set(ASSET, 1);
    await h.supervisor.tick();
    h.policy.next = "hold";
    h.prices.set(ASSET, 1.1);
    await h.supervisor.tick();

    expect(h.policy.tableSize).toBe(0);
  });

  it("never holds more than one position per asset", async () => {
    const h = harness({ assets: [ASSET, ASSET] });
    h.prices.set(ASSET, 1);

    await h.supervisor.tick();
    await h.supervisor.tick();

    expect(h.supervisor.openPositions()).toHaveLength(1);
    expect(h.aggregator.quotes).toHaveLength(1);
  });
});
