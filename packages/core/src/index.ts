/**
 * Core package centralizes shared contracts, the wire protocol, logging and
 * configuration. Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./protocol";
export * from "./config";
export * from "./env";
export * from "./utils/logger";
