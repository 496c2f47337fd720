export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/area-template";
export * from "./schemas/dungeon-map";
export * from "./types/area";
export * from "./types/error";
export * from "./types/result";
