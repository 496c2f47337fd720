export * from "./populate-content";
