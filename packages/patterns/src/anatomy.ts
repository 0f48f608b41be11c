import type { Candle } from "@marketlens/core";

export interface CandleAnatomy {
	body: number;
	upperWick: number;
	lowerWick: number;
	range: number;
}

export const measureCandle = (candle: Candle): CandleAnatomy => ({
	body: Math.abs(candle.close - candle.open),
	upperWick: candle.high - Math.max(candle.open, candle.close),
	lowerWick: Math.min(candle.open, candle.close) - candle.low,
	range: candle.high - candle.low,
});
