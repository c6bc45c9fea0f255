import type { Connection } from "@solana/web3.js";
import {
  DataUnavailableError,
  FetchError,
  Logger,
  RateLimitedCache,
  RateLimiter,
  RiskManager,
  loadConfig,
  maskPubkey,
  systemClock,
  type BotConfig,
  type Clock,
  type Mode,
  type PriceSnapshot,
  type SentimentReading,
} from "@qtrader/core";
import { JupiterClient, quoteSolPriceUsd } from "@qtrader/jupiter";
import {
  DexScreenerClient,
  HttpSentimentOracle,
  MarketDataGateway,
  NeutralSentimentOracle,
  PriceHistory,
  type SentimentOracle,
} from "@qtrader/market";
import { PolicyEngine, QTable, type TrainingEnvironment } from "@qtrader/policy";
import {
  SolanaWallet,
  TxConfirmationMonitor,
  checkRpcHealth,
  createRpcConnection,
  isValidMint,
  loadKeypairFromFile,
  rpcSignatureStatusSource,
} from "@qtrader/solana";
import { ControlLoop } from "./control-loop.js";
import { ExecutionGateway } from "./execution.js";
import { TradingSupervisor } from "./supervisor.js";

const SOL_PRICE_KEY = "sol-usd";

/** Live trading needs a wallet whose public key parses; paper mode needs none. */
export function walletReady(mode: Mode, publicKey: string | undefined): boolean {
  if (mode === "paper") {
    return true;
  }
  return publicKey !== undefined && isValidMint(publicKey);
}

export class TradingBot {
  private readonly config: BotConfig;
  private readonly logger: Logger;
  private readonly connection: Connection;
  private readonly wallet: SolanaWallet | null;
  private readonly market: MarketDataGateway;
  private readonly policy: PolicyEngine;
  private readonly supervisor: TradingSupervisor;
  private readonly loop: ControlLoop;

  public constructor(config: BotConfig = loadConfig(), clock: Clock = systemClock) {
    this.config = config;
    this.logger = new Logger({ component: "BOT", level: config.LOG_LEVEL });
    this.connection = createRpcConnection(config.RPC_URL);

    const priceLimiter = new RateLimiter(config.PRICE_RATE_LIMIT_MS, clock);
    const socialLimiter = new RateLimiter(config.SOCIAL_RATE_LIMIT_MS, clock);
    const rpcLimiter = new RateLimiter(config.RPC_RATE_LIMIT_MS, clock);

    this.wallet =
      config.MODE === "live" && config.WALLET_KEYPAIR_PATH
        ? new SolanaWallet({
            connection: this.connection,
            keypair: loadKeypairFromFile(config.WALLET_KEYPAIR_PATH),
            limiter: rpcLimiter,
            requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
            logger: this.logger.child("WALLET"),
          })
        : null;

    const jupiter = new JupiterClient(config.JUPITER_BASE_URL, config.REQUEST_TIMEOUT_MS, this.logger.child("JUPITER"));
    const sentimentOracle: SentimentOracle = config.SENTIMENT_API_URL
      ? new HttpSentimentOracle(config.SENTIMENT_API_URL, config.REQUEST_TIMEOUT_MS, this.logger.child("SENTIMENT"))
      : new NeutralSentimentOracle();

    this.market = new MarketDataGateway({
      priceOracle: new DexScreenerClient(
        config.DEXSCREENER_BASE_URL,
        config.REQUEST_TIMEOUT_MS,
        this.logger.child("DEXSCREENER"),
      ),
      sentimentOracle,
      priceCache: new RateLimitedCache<PriceSnapshot | null>({ limiter: priceLimiter, clock }),
      socialCache: new RateLimitedCache<SentimentReading>({ limiter: socialLimiter, clock }),
      priceTtlMs: config.PRICE_CACHE_SECONDS * 1000,
      socialTtlMs: config.SOCIAL_CACHE_SECONDS * 1000,
      history: new PriceHistory(config.VOLATILITY_WINDOW),
      surge: {
        mentionThreshold: config.SURGE_MENTION_THRESHOLD,
        sentimentThreshold: config.SURGE_SENTIMENT_THRESHOLD,
      },
      logger: this.logger.child("MARKET"),
      clock,
    });

    const solPriceCache = new RateLimitedCache<number | null>({ limiter: priceLimiter, clock });
    const risk = new RiskManager(
      { accountValueUsd: config.ACCOUNT_VALUE_USD, stopLossFraction: config.STOP_LOSS_FRACTION },
      () => solPriceCache.getOrFetch(SOL_PRICE_KEY, config.SOL_PRICE_CACHE_SECONDS * 1000, () => quoteSolPriceUsd(jupiter)),
      this.logger.child("RISK"),
    );

    this.policy = new PolicyEngine({
      table: new QTable(config.Q_TABLE_MAX_ENTRIES),
      params: {
        epsilonDecay: config.EPSILON_DECAY,
        rewardBuyDivisor: config.REWARD_BUY_DIVISOR,
        rewardSellDivisor: config.REWARD_SELL_DIVISOR,
        rewardHoldDivisor: config.REWARD_HOLD_DIVISOR,
      },
      clock,
      logger: this.logger.child("POLICY"),
    });

    const execution = new ExecutionGateway({
      aggregator: jupiter,
      wallet: this.wallet,
      mode: config.MODE,
      slippageBps: config.SLIPPAGE_BPS,
      maxAttempts: config.EXEC_MAX_ATTEMPTS,
      baseBackoffMs: config.EXEC_BASE_BACKOFF_MS,
      priorityFeeLamports: config.PRIORITY_FEE_LAMPORTS,
      logger: this.logger.child("EXECUTE"),
      clock,
    });

    const monitor = new TxConfirmationMonitor({
      source: rpcSignatureStatusSource(this.connection),
      limiter: rpcLimiter,
      maxAttempts: config.CONFIRM_MAX_ATTEMPTS,
      baseDelayMs: config.CONFIRM_BASE_DELAY_MS,
      requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
      logger: this.logger.child("TX"),
      clock,
      onAlert: (resolution) =>
        this.logger.error("ALERT", "ALERT TRANSACTION NEEDS RECONCILIATION", {
          signature: resolution.signature,
          mint: resolution.mint,
          attempts: resolution.attempts,
          error: resolution.error,
        }),
    });

    this.supervisor = new TradingSupervisor({
      assets: config.TOKENS_TO_TRADE,
      market: this.market,
      policy: this.policy,
      risk,
      execution,
      monitor,
      riskFraction: config.RISK_FRACTION,
      takeProfitFraction: config.TAKE_PROFIT_FRACTION,
      surgeSellFraction: config.SURGE_SELL_FRACTION,
      onlineLearning: config.ONLINE_LEARNING,
      logger: this.logger.child("SUPERVISOR"),
      clock,
    });

    this.loop = new ControlLoop({
      pollMs: config.BOT_POLL_SECONDS * 1000,
      errorBackoffMs: config.LOOP_ERROR_BACKOFF_SECONDS * 1000,
      logger: this.logger.child("LOOP"),
      clock,
    });
  }

  public async start(): Promise<void> {
    const walletKey = this.wallet?.publicKey;
    this.logger.ok("BOOT", "===== QTRADER BOT START =====", {
      mode: this.config.MODE,
      pollSeconds: this.config.BOT_POLL_SECONDS,
      assets: this.supervisor.trackedAssets.length,
      wallet: walletKey ? maskPubkey(walletKey) : "PAPER-NO-WALLET",
    });

    if (!walletReady(this.config.MODE, walletKey)) {
      this.logger.error("WALLET_INVALID", "ERROR INVALID WALLET, TRADING NOT STARTED", {});
      return;
    }

    const rpcHealth = await checkRpcHealth(this.connection, this.config.REQUEST_TIMEOUT_MS);
    if (!rpcHealth.ok) {
      this.logger.warn("RPC_UNHEALTHY", "WARNING RPC HEALTH CHECK FAILED", { error: rpcHealth.error });
    }

    await this.train();

    const ticks = await this.loop.run(() => this.supervisor.tick());
    this.logger.ok("SHUTDOWN", "BOT STOPPED", { ticks, openPositions: this.supervisor.openPositions().length });
  }

  /** Stops before the next tick; the tick in progress runs to completion. */
  public stop(): void {
    this.loop.stop();
    this.logger.warn("STOP", "STOP SIGNAL RECEIVED", {});
  }

  private async train(): Promise<void> {
    const environment: TrainingEnvironment = {
      observe: (mint) => this.orNull(() => this.market.observe(mint, null)),
      price: (mint) => this.orNull(() => this.market.currentPrice(mint, true)),
    };

    for (const mint of this.supervisor.trackedAssets) {
      if (this.loop.stopped) {
        return;
      }
      if (!isValidMint(mint)) {
        continue;
      }
      await this.policy.train(mint, this.config.TRAINING_EPISODES, environment, {
        tickMs: this.config.TRAINING_TICK_SECONDS * 1000,
      });
    }
  }

  private async orNull<T>(read: () => Promise<T>): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      if (error instanceof DataUnavailableError || error instanceof FetchError) {
        return null;
      }
      throw error;
    }
  }
}
