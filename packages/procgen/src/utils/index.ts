export * from "./ascii-renderer";
