import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { maskPubkey, parseConfig } from "./config.js";

const base = {
  RPC_URL: "http://127.0.0.1:8899",
  TOKENS_TO_TRADE: "So11111111111111111111111111111111111111112, EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v,,",
};

describe("parseConfig", () => {
  it("applies defaults and splits the token list", () => {
    const config = parseConfig(base);

    expect(config.MODE).toBe("paper");
    expect(config.TOKENS_TO_TRADE).toEqual([
      "So11111111111111111111111111111111111111112",
      "EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v",
    ]);
    expect(config.RISK_FRACTION).toBe(0.02);
    expect(config.STOP_LOSS_FRACTION).toBe(0.1);
    expect(config.Q_TABLE_MAX_ENTRIES).toBe(10_000);
    expect(config.ONLINE_LEARNING).toBe(true);
    expect(config.SENTIMENT_API_URL).toBeUndefined();
    expect(config.WALLET_KEYPAIR_PATH).toBeUndefined();
  });

  it("coerces numeric and boolean overrides", () => {
    const config = parseConfig({ ...base, BOT_POLL_SECONDS: "30", ONLINE_LEARNING: "FALSE", SLIPPAGE_BPS: "75" });

    expect(config.BOT_POLL_SECONDS).toBe(30);
    expect(config.ONLINE_LEARNING).toBe(false);
    expect(config.SLIPPAGE_BPS).toBe(75);
  });

  it("resolves the keypair path against the base directory", () => {
    const config = parseConfig({ ...base, MODE: "live", WALLET_KEYPAIR_PATH: "keys/id.json" }, "/srv/bot");
    expect(config.WALLET_KEYPAIR_PATH).toBe("/srv/bot/keys/id.json");
  });

  it("requires a keypair in live mode", () => {
    expect(() => parseConfig({ ...base, MODE: "live" })).toThrow("MODE=live requires WALLET_KEYPAIR_PATH");
  });

  it("rejects out-of-range fractions and an empty token list", () => {
    expect(() => parseConfig({ ...base, RISK_FRACTION: "1.5" })).toThrow(ZodError);
    expect(() => parseConfig({ ...base, SLIPPAGE_BPS: "abc" })).toThrow(ZodError);
    expect(() => parseConfig({ RPC_URL: base.RPC_URL, TOKENS_TO_TRADE: " , " })).toThrow(ZodError);
  });
});

describe("maskPubkey", () => {
  it("keeps the first and last four characters", () => {
    expect(maskPubkey("So11111111111111111111111111111111111111112")).toBe("So11...1112");
    expect(maskPubkey(undefined)).toBe("N/A");
  });
});
