export * from "./dexscreener.js";
export * from "./sentiment.js";
export * from "./volatility.js";
export * from "./gateway.js";
