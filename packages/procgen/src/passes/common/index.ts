export * from "./finalize";
export * from "./initialize-level";
