/**
 * Shared contracts for every marketlens package: candle and zone types,
 * warm-up series helpers, analysis configuration and the structured logger.
 */
export * from "./types";
export * from "./candle";
export * from "./series";
export * from "./config";
export * from "./utils/logger";
