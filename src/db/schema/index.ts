export * from "./decision-records.ts";
export * from "./trade-outcomes.ts";
export * from "./system-configs.ts";
