export * from "./diamonds";
export * from "./trophy-exit";
