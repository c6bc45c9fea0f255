export * from "./q-table.js";
export * from "./policy-engine.js";
