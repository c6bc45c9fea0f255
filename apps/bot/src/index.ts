import { TradingBot } from "./bot.js";

const bot = new TradingBot();

process.on("SIGINT", () => {
  bot.stop();
});
process.on("SIGTERM", () => {
  bot.stop();
});

bot.start().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
