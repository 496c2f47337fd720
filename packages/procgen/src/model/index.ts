export * from "./corridor";
export * from "./dungeon-map";
export * from "./room";
