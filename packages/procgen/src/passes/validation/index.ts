export * from "./intersection";
export * from "./invariant-checks";
