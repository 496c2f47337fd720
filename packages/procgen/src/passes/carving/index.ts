export * from "./corridor-router";
