/**
 * Cellular Automata Generator Module
 */

export * from "./constants";
export * from "./generator";
export * from "./passes";
