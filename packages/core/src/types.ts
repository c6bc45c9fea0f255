export type Mode = "paper" | "live";

export type LogLevel = "DEBUG" | "INFO" | "OK" | "WARN" | "ERROR";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  code: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface BotConfig {
  RPC_URL: string;
  MODE: Mode;
  WALLET_KEYPAIR_PATH: string | undefined;
  TOKENS_TO_TRADE: string[];
  ACCOUNT_VALUE_USD: number;
  RISK_FRACTION: number;
  STOP_LOSS_FRACTION: number;
  TAKE_PROFIT_FRACTION: number;
  SLIPPAGE_BPS: number;
  PRIORITY_FEE_LAMPORTS: number;
  BOT_POLL_SECONDS: number;
  LOOP_ERROR_BACKOFF_SECONDS: number;
  PRICE_RATE_LIMIT_MS: number;
  SOCIAL_RATE_LIMIT_MS: number;
  RPC_RATE_LIMIT_MS: number;
  PRICE_CACHE_SECONDS: number;
  SOCIAL_CACHE_SECONDS: number;
  SOL_PRICE_CACHE_SECONDS: number;
  REQUEST_TIMEOUT_MS: number;
  EXEC_MAX_ATTEMPTS: number;
  EXEC_BASE_BACKOFF_MS: number;
  CONFIRM_MAX_ATTEMPTS: number;
  CONFIRM_BASE_DELAY_MS: number;
  SURGE_SELL_FRACTION: number;
  SURGE_MENTION_THRESHOLD: number;
  SURGE_SENTIMENT_THRESHOLD: number;
  VOLATILITY_WINDOW: number;
  TRAINING_EPISODES: number;
  TRAINING_TICK_SECONDS: number;
  EPSILON_DECAY: number;
  Q_TABLE_MAX_ENTRIES: number;
  ONLINE_LEARNING: boolean;
  REWARD_BUY_DIVISOR: number;
  REWARD_SELL_DIVISOR: number;
  REWARD_HOLD_DIVISOR: number;
  JUPITER_BASE_URL: string;
  DEXSCREENER_BASE_URL: string;
  SENTIMENT_API_URL: string | undefined;
  LOG_LEVEL: LogLevel;
}

export const ACTIONS = ["buy", "sell", "hold"] as const;

export type Action = (typeof ACTIONS)[number];

/**
 * Market state fed to the policy. Only these four fields take part in
 * the Q-table key, in this order.
 */
export interface Observation {
  readonly priceChange: number;
  readonly sentimentScore: number;
  readonly volume24h: number;
  readonly volatility: number;
}

export interface AssetObservation extends Observation {
  readonly mint: string;
  readonly symbol: string;
  readonly priceUsd: number;
  readonly observedAt: number;
}

export interface PriceSnapshot {
  mint: string;
  priceUsd: number;
  baseSymbol: string;
  quoteSymbol: string;
  volume24hUsd: number;
  liquidityUsd: number;
}

export interface SentimentReading {
  score: number;
  mentions: number;
}

export interface Position {
  mint: string;
  entryPriceUsd: number;
  /** Atomic token amount still held; shrinks on partial exits. */
  quantityRaw: string;
  openedAt: number;
}

export type SellReason = "STOP_LOSS" | "SURGE_PARTIAL" | "TAKE_PROFIT" | "POLICY_SELL";

export interface TxHandle {
  side: "BUY" | "SELL";
  mint: string;
  /** Absent in paper mode: nothing was submitted. */
  signature: string | null;
  inAmountRaw: string;
  expectedOutRaw: string;
  routeSummary: string[];
  submittedAt: number;
}

export type TxStatus = "SUBMITTED" | "CONFIRMED" | "FAILED";

export interface PendingTransaction {
  signature: string;
  mint: string;
  submittedAt: number;
}
