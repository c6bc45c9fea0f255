import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import type { BotConfig } from "./types.js";

const num = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : Number.NaN;
    });

const intNum = (defaultValue: number) =>
  num(defaultValue).refine((value) => Number.isInteger(value), {
    message: "Expected integer",
  });

const bool = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      return value.trim().toLowerCase() === "true";
    });

const list = () =>
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const fraction = (name: string, defaultValue: number) =>
  num(defaultValue).refine((v) => v > 0 && v <= 1, `${name} must be > 0 and <= 1`);

const envSchema = z.object({
  RPC_URL: z.string().min(1, "RPC_URL is required"),
  MODE: z.enum(["paper", "live"]).default("paper"),
  WALLET_KEYPAIR_PATH: z.string().optional(),
  TOKENS_TO_TRADE: list().refine((v) => v.length > 0, "TOKENS_TO_TRADE must list at least one mint"),
  ACCOUNT_VALUE_USD: num(100).refine((v) => v > 0, "ACCOUNT_VALUE_USD must be > 0"),
  RISK_FRACTION: fraction("RISK_FRACTION", 0.02),
  STOP_LOSS_FRACTION: num(0.1).refine((v) => v > 0 && v < 1, "STOP_LOSS_FRACTION must be > 0 and < 1"),
  TAKE_PROFIT_FRACTION: num(0.45).refine((v) => v > 0, "TAKE_PROFIT_FRACTION must be > 0"),
  SLIPPAGE_BPS: intNum(50).refine((v) => v > 0, "SLIPPAGE_BPS must be > 0"),
  PRIORITY_FEE_LAMPORTS: intNum(0).refine((v) => v >= 0, "PRIORITY_FEE_LAMPORTS must be >= 0"),
  BOT_POLL_SECONDS: intNum(10).refine((v) => v >= 1, "BOT_POLL_SECONDS must be >= 1"),
  LOOP_ERROR_BACKOFF_SECONDS: intNum(60).refine((v) => v >= 1, "LOOP_ERROR_BACKOFF_SECONDS must be >= 1"),
  PRICE_RATE_LIMIT_MS: intNum(1000).refine((v) => v >= 0, "PRICE_RATE_LIMIT_MS must be >= 0"),
  SOCIAL_RATE_LIMIT_MS: intNum(1000).refine((v) => v >= 0, "SOCIAL_RATE_LIMIT_MS must be >= 0"),
  RPC_RATE_LIMIT_MS: intNum(1000).refine((v) => v >= 0, "RPC_RATE_LIMIT_MS must be >= 0"),
  PRICE_CACHE_SECONDS: intNum(60).refine((v) => v > 0, "PRICE_CACHE_SECONDS must be > 0"),
  SOCIAL_CACHE_SECONDS: intNum(60).refine((v) => v > 0, "SOCIAL_CACHE_SECONDS must be > 0"),
  SOL_PRICE_CACHE_SECONDS: intNum(120).refine((v) => v > 0, "SOL_PRICE_CACHE_SECONDS must be > 0"),
  REQUEST_TIMEOUT_MS: intNum(10_000).refine((v) => v > 0, "REQUEST_TIMEOUT_MS must be > 0"),
  EXEC_MAX_ATTEMPTS: intNum(3).refine((v) => v > 0, "EXEC_MAX_ATTEMPTS must be > 0"),
  EXEC_BASE_BACKOFF_MS: intNum(400).refine((v) => v >= 0, "EXEC_BASE_BACKOFF_MS must be >= 0"),
  CONFIRM_MAX_ATTEMPTS: intNum(5).refine((v) => v > 0, "CONFIRM_MAX_ATTEMPTS must be > 0"),
  CONFIRM_BASE_DELAY_MS: intNum(2000).refine((v) => v >= 0, "CONFIRM_BASE_DELAY_MS must be >= 0"),
  SURGE_SELL_FRACTION: fraction("SURGE_SELL_FRACTION", 0.25),
  SURGE_MENTION_THRESHOLD: intNum(200).refine((v) => v >= 0, "SURGE_MENTION_THRESHOLD must be >= 0"),
  SURGE_SENTIMENT_THRESHOLD: num(0.7).refine((v) => v >= 0 && v <= 1, "SURGE_SENTIMENT_THRESHOLD must be 0..1"),
  VOLATILITY_WINDOW: intNum(20).refine((v) => v >= 2, "VOLATILITY_WINDOW must be >= 2"),
  TRAINING_EPISODES: intNum(20).refine((v) => v >= 0, "TRAINING_EPISODES must be >= 0"),
  TRAINING_TICK_SECONDS: intNum(5).refine((v) => v >= 0, "TRAINING_TICK_SECONDS must be >= 0"),
  EPSILON_DECAY: num(0.05).refine((v) => v > 0 && v <= 1, "EPSILON_DECAY must be > 0 and <= 1"),
  Q_TABLE_MAX_ENTRIES: intNum(10_000).refine((v) => v > 0, "Q_TABLE_MAX_ENTRIES must be > 0"),
  ONLINE_LEARNING: bool(true),
  REWARD_BUY_DIVISOR: num(10).refine((v) => v > 0, "REWARD_BUY_DIVISOR must be > 0"),
  REWARD_SELL_DIVISOR: num(10).refine((v) => v > 0, "REWARD_SELL_DIVISOR must be > 0"),
  REWARD_HOLD_DIVISOR: num(20).refine((v) => v > 0, "REWARD_HOLD_DIVISOR must be > 0"),
  JUPITER_BASE_URL: z.string().default("https://lite-api.jup.ag/swap/v1"),
  DEXSCREENER_BASE_URL: z.string().default("https://api.dexscreener.com"),
  SENTIMENT_API_URL: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined)),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "OK", "WARN", "ERROR"]).default("INFO"),
});

let cachedConfig: BotConfig | null = null;

export function parseConfig(env: Record<string, string | undefined>, baseDir = process.cwd()): BotConfig {
  const parsed = envSchema.parse(env);
  if (parsed.MODE === "live" && !parsed.WALLET_KEYPAIR_PATH) {
    throw new Error("MODE=live requires WALLET_KEYPAIR_PATH");
  }

  return {
    ...parsed,
    SENTIMENT_API_URL: parsed.SENTIMENT_API_URL,
    WALLET_KEYPAIR_PATH: parsed.WALLET_KEYPAIR_PATH ? path.resolve(baseDir, parsed.WALLET_KEYPAIR_PATH) : undefined,
  };
}

export function loadConfig(): BotConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const baseDir = process.env.APP_ROOT ?? process.env.INIT_CWD ?? process.cwd();
  const envCandidates = [path.resolve(baseDir, ".env"), path.resolve(process.cwd(), ".env")];
  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      break;
    }
  }

  cachedConfig = parseConfig(process.env, baseDir);
  return cachedConfig;
}

export function maskPubkey(pubkey: string | undefined): string {
  if (!pubkey || pubkey.length < 10) {
    return "N/A";
  }
  return `${pubkey.slice(0, 4)}...${pubkey.slice(-4)}`;
}
