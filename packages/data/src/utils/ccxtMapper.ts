import type { OHLCV } from "ccxt";
import type { MarketCandle } from "@marketlens/core";

const isFiniteNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);

/**
 * Maps one ccxt row; rows missing a timestamp or any OHLC price map to
 * `null`. A missing volume reads as 0.
 */
export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): MarketCandle | null => {
	const [timestamp, open, high, low, close, volume] = row;
	if (
		!isFiniteNumber(timestamp) ||
		!isFiniteNumber(open) ||
		!isFiniteNumber(high) ||
		!isFiniteNumber(low) ||
		!isFiniteNumber(close)
	) {
		return null;
	}
	return {
		symbol,
		timeframe,
		timestamp,
		open,
		high,
		low,
		close,
		volume: isFiniteNumber(volume) ? volume : 0,
	};
};

/**
 * Orders candles by timestamp and keeps the last copy of any duplicate.
 */
export const normalizeCandles = (candles: readonly MarketCandle[]): MarketCandle[] => {
	const byTimestamp = new Map<number, MarketCandle>();
	for (const candle of candles) {
		byTimestamp.set(candle.timestamp, candle);
	}
	return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
};
