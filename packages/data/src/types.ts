import type { OHLCV } from "ccxt";
import type { MarketCandle } from "@marketlens/core";

/**
 * Read-only access to historical candles for one venue.
 */
export interface MarketDataClient {
	/**
	 * @param limit - Maximum number of candles to fetch
	 * @param since - Optional timestamp (ms) to fetch candles from
	 * @returns Candles in chronological order
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<MarketCandle[]>;
}

/** The slice of a ccxt exchange the client relies on. */
export interface OhlcvSource {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface DataLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
}
