export * from "./tracked-symbols";
export * from "./format";
export * from "./market-hours";
