export * from "./batch";
export * from "./compute-stats";
export * from "./reachability";
export * from "./result-types";
export * from "./rule-checks";
export * from "./validate-level";
