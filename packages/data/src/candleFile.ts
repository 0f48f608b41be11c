import fs from "node:fs";
import type { MarketCandle } from "@marketlens/core";

export interface CandleFileOptions {
	symbol?: string;
	timeframe?: string;
}

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readFinite = (value: unknown, label: string): number => {
	const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
	if (typeof num !== "number" || !Number.isFinite(num)) {
		throw new Error(`${label} must be a finite number, got ${JSON.stringify(value)}`);
	}
	return num;
};

const readOptionalFinite = (value: unknown, label: string, fallback: number): number =>
	value === undefined || value === null ? fallback : readFinite(value, label);

const parseRow = (
	row: unknown,
	index: number,
	options: Required<CandleFileOptions>
): MarketCandle => {
	const label = `candles[${index}]`;

	if (Array.isArray(row)) {
		if (row.length < 5) {
			throw new Error(
				`${label} must be [timestamp, open, high, low, close, volume?], got ${row.length} values`
			);
		}
		const [timestamp, open, high, low, close, volume] = row;
		return {
			symbol: options.symbol,
			timeframe: options.timeframe,
			timestamp: readFinite(timestamp, `${label}.timestamp`),
			open: readFinite(open, `${label}.open`),
			high: readFinite(high, `${label}.high`),
			low: readFinite(low, `${label}.low`),
			close: readFinite(close, `${label}.close`),
			volume: readOptionalFinite(volume, `${label}.volume`, 0),
		};
	}

	if (isRecord(row)) {
		const [open, high, low, close] = PRICE_FIELDS.map((field) =>
			readFinite(row[field], `${label}.${field}`)
		);
		return {
			symbol: typeof row.symbol === "string" ? row.symbol : options.symbol,
			timeframe: typeof row.timeframe === "string" ? row.timeframe : options.timeframe,
			timestamp: readOptionalFinite(row.timestamp, `${label}.timestamp`, index),
			open,
			high,
			low,
			close,
			volume: readOptionalFinite(row.volume, `${label}.volume`, 0),
		};
	}

	throw new Error(`${label} must be an object or an OHLCV array`);
};

/**
 * Validates an untrusted payload into candles. Accepts a bare array or an
 * object with a `candles` (or `ohlc`) array; rows are either
 * `{ open, high, low, close, ... }` objects or ccxt-style tuples.
 * File order is kept: the analysis treats the index as time.
 */
export const parseCandleRows = (
	payload: unknown,
	options: CandleFileOptions = {}
): MarketCandle[] => {
	const rows = isRecord(payload) ? (payload.candles ?? payload.ohlc) : payload;
	if (!Array.isArray(rows)) {
		throw new Error(
			"Candle payload must be an array or an object with a \"candles\" array"
		);
	}
	const resolved: Required<CandleFileOptions> = {
		symbol: options.symbol ?? "UNKNOWN",
		timeframe: options.timeframe ?? "unknown",
	};
	return rows.map((row: unknown, index) => parseRow(row, index, resolved));
};

export const loadCandlesFromFile = (
	filePath: string,
	options: CandleFileOptions = {}
): MarketCandle[] => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Candle file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	let payload: unknown;
	try {
		payload = JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Candle file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
	return parseCandleRows(payload, options);
};
