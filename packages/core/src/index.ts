export * from "./types.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./clock.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./rate-limit.js";
export * from "./retry.js";
export * from "./timeout.js";
export * from "./risk.js";
