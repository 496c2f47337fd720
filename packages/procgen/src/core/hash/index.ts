/**
 * Hash utilities module
 *
 * Provides FNV-64 hashing and map checksum calculation.
 */

export * from "./checksum";
export * from "./fnv64";
