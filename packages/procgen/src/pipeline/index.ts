/**
 * Pipeline module - pass composition and tracing.
 */

export * from "./builder";
export * from "./trace";
export * from "./types";
