export * from "./carving";
export * from "./content";
export * from "./validation";
