export * from "./ascii-renderer";
export * from "./cli-args";
