export * from "./result-types";
export * from "./validate-map";
