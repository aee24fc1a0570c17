export * from "./random/lcg-random";
export * from "./schemas/config";
export * from "./schemas/seed";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
