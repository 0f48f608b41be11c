import type { Candle } from "./types";

export const isBullish = (candle: Candle): boolean => candle.close > candle.open;

export const isBearish = (candle: Candle): boolean => candle.close < candle.open;

/** Midpoint of the candle body. */
export const bodyMidpoint = (candle: Candle): number => (candle.open + candle.close) / 2;
