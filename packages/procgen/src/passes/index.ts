/**
 * Generation passes, in pipeline order:
 * initialize, layout, trophy and exit, diamonds, floor hazards,
 * platform hazards, finalize.
 */

export * from "./common";
export * from "./content";
export * from "./hazards";
export * from "./layout";
