export * from "./archetypes";
export * from "./layout-platforms";
