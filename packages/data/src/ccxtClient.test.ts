import type { OHLCV } from "ccxt";
import { describe, expect, it, vi } from "vitest";
import { CcxtMarketDataClient, createExchangeSource } from "./ccxtClient";
import type { OhlcvSource } from "./types";

const row = (timestamp: number, close: number): OHLCV => [
	timestamp,
	close - 1,
	close + 1,
	close - 2,
	close,
	10,
];

const buildSource = (rows: OHLCV[]) => {
	const fetchOHLCV = vi.fn(async () => rows);
	const source: OhlcvSource = { fetchOHLCV };
	return { source, fetchOHLCV };
};

describe("CcxtMarketDataClient", () => {
	it("passes since and limit through in ccxt argument order", async () => {
		const { source, fetchOHLCV } = buildSource([]);
		const client = new CcxtMarketDataClient(source);

		await client.fetchOHLCV("BTC/USDT", "1h", 250, 1_000);

		expect(fetchOHLCV).toHaveBeenCalledWith("BTC/USDT", "1h", 1_000, 250);
	});

	it("defaults the limit to 500", async () => {
		const { source, fetchOHLCV } = buildSource([]);
		const client = new CcxtMarketDataClient(source);

		await client.fetchOHLCV("ETH/USDT", "15m");

		expect(fetchOHLCV).toHaveBeenCalledWith("ETH/USDT", "15m", undefined, 500);
	});

	it("maps rows into sorted, de-duplicated candles", async () => {
		const { source } = buildSource([row(3_000, 30), row(1_000, 10), row(3_000, 31)]);
		const warn = vi.fn();
		const info = vi.fn();
		const client = new CcxtMarketDataClient(source, { warn, info });

		const candles = await client.fetchOHLCV("BTC/USDT", "1m");

		expect(candles).toEqual([
			{
				symbol: "BTC/USDT",
				timeframe: "1m",
				timestamp: 1_000,
				open: 9,
				high: 11,
				low: 8,
				close: 10,
				volume: 10,
			},
			{
				symbol: "BTC/USDT",
				timeframe: "1m",
				timestamp: 3_000,
				open: 30,
				high: 32,
				low: 29,
				close: 31,
				volume: 10,
			},
		]);
		expect(warn).toHaveBeenCalledWith("ohlcv_duplicates_dropped", {
			symbol: "BTC/USDT",
			timeframe: "1m",
			received: 3,
			kept: 2,
		});
		expect(info).toHaveBeenCalledWith("ohlcv_fetched", {
			symbol: "BTC/USDT",
			timeframe: "1m",
			count: 2,
		});
	});
});

describe("CcxtMarketDataClient incomplete rows", () => {
	it("drops rows with a missing price and warns", async () => {
		const { source } = buildSource([row(1_000, 10), [2_000, 11, 12, undefined, 11.5, 3]]);
		const warn = vi.fn();
		const client = new CcxtMarketDataClient(source, { warn });

		const candles = await client.fetchOHLCV("BTC/USDT", "1m");

		expect(candles.map((candle) => candle.timestamp)).toEqual([1_000]);
		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn).toHaveBeenCalledWith("ohlcv_incomplete_dropped", {
			symbol: "BTC/USDT",
			timeframe: "1m",
			received: 2,
			dropped: 1,
		});
	});
});

describe("createExchangeSource", () => {
	it("rejects exchanges without a factory", () => {
		expect(() => createExchangeSource("kraken")).toThrow(
			'Unsupported exchange "kraken". Expected one of: binance, mexc'
		);
	});
});
