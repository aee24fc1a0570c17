/**
 * Core module - grid primitives and layout constants.
 */

export * from "./constants";
export * from "./grid";
