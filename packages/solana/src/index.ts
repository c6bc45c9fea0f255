export * from "./rpc.js";
export * from "./wallet.js";
export * from "./tx-monitor.js";
