import ccxt from "ccxt";
import type { MarketCandle } from "@marketlens/core";
import type { DataLogger, MarketDataClient, OhlcvSource } from "./types";
import { mapCcxtCandleToCandle, normalizeCandles } from "./utils/ccxtMapper";

const DEFAULT_LIMIT = 500;

const EXCHANGE_FACTORIES: Record<string, () => OhlcvSource> = {
	binance: () => new ccxt.binance({ enableRateLimit: true }),
	mexc: () =>
		new ccxt.mexc({
			enableRateLimit: true,
			options: { defaultType: "spot" },
		}),
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

export const createExchangeSource = (exchangeId: string): OhlcvSource => {
	const factory = EXCHANGE_FACTORIES[exchangeId.toLowerCase()];
	if (!factory) {
		throw new Error(
			`Unsupported exchange "${exchangeId}". Expected one of: ${SUPPORTED_EXCHANGES.join(", ")}`
		);
	}
	return factory();
};

/**
 * Public OHLCV through ccxt. No credentials: analysis only reads candles.
 */
export class CcxtMarketDataClient implements MarketDataClient {
	constructor(
		private readonly source: OhlcvSource,
		private readonly logger: DataLogger = {}
	) {}

	static forExchange(exchangeId: string, logger?: DataLogger): CcxtMarketDataClient {
		return new CcxtMarketDataClient(createExchangeSource(exchangeId), logger);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = DEFAULT_LIMIT,
		since?: number
	): Promise<MarketCandle[]> {
		const rows = await this.source.fetchOHLCV(symbol, timeframe, since, limit);
		const complete: MarketCandle[] = [];
		for (const row of rows) {
			const candle = mapCcxtCandleToCandle(row, symbol, timeframe);
			if (candle) {
				complete.push(candle);
			}
		}
		if (complete.length < rows.length) {
			this.logger.warn?.("ohlcv_incomplete_dropped", {
				symbol,
				timeframe,
				received: rows.length,
				dropped: rows.length - complete.length,
			});
		}
		const candles = normalizeCandles(complete);
		if (candles.length < complete.length) {
			this.logger.warn?.("ohlcv_duplicates_dropped", {
				symbol,
				timeframe,
				received: complete.length,
				kept: candles.length,
			});
		}
		this.logger.info?.("ohlcv_fetched", { symbol, timeframe, count: candles.length });
		return candles;
	}
}
