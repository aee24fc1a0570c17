export * from "./critical-zones";
export * from "./density";
export * from "./floor-hazards";
export * from "./platform-hazards";
