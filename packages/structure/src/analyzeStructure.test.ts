import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig, type Candle } from "@marketlens/core";
import { analyzeStructure } from "./analyzeStructure";

const candle = (open: number, high: number, low: number, close: number): Candle => ({
	open,
	high,
	low,
	close,
});

const compactConfig: AnalysisConfig = {
	...DEFAULT_ANALYSIS_CONFIG,
	structure: { ...DEFAULT_ANALYSIS_CONFIG.structure, pivotLegs: 1, sweepLookback: 3 },
};

describe("analyzeStructure", () => {
	const series = [
		candle(10, 11, 9, 10.5),
		candle(10.5, 12, 10, 11.8),
		candle(11.8, 11.9, 10.2, 10.4),
		candle(10.4, 10.6, 8.5, 10.3),
	];

	it("combines pivots, blocks and sweeps with the configured windows", () => {
		const result = analyzeStructure(series, compactConfig);
		expect(result.swingHighs).toEqual([null, 12, null, null]);
		expect(result.swingLows).toEqual([null, null, null, null]);
		expect(result.obZones).toEqual([{ kind: "bearish", top: 11.8, bottom: 10.5, index: 1 }]);
		expect(result.obBearish).toEqual([false, true, false, false]);
		expect(result.obBullish).toEqual([false, false, false, false]);
		expect(result.fvgZones).toEqual([]);
		expect(result.sweepBullish).toEqual([false, false, false, true]);
		expect(result.sweeps).toEqual([{ kind: "bullish", index: 3, sweptLevel: 9 }]);
		expect(result.srZones).toEqual([]);
		expect(result.rejectionBullish).toEqual([false, false, false, false]);
	});

	it("projects every fair value gap onto its anchor index", () => {
		const gaps = [
			candle(10, 11, 9.5, 10.8),
			candle(10.8, 13, 10.7, 12.9),
			candle(12.9, 14, 11.5, 13.8),
		];
		const result = analyzeStructure(gaps);
		expect(result.fvgBullish).toEqual([false, false, true]);
		expect(result.fvgBearish).toEqual([false, false, false]);
		expect(result.fvgZones.map((zone) => zone.index)).toEqual([2]);
	});

	it("flags a rejection once ATR is available", () => {
		const config: AnalysisConfig = {
			indicators: { ...DEFAULT_ANALYSIS_CONFIG.indicators, atrPeriod: 2 },
			structure: { ...compactConfig.structure, rejectionWindow: 3 },
		};
		const result = analyzeStructure(series, config);
		expect(result.rejectionBearish).toEqual([false, false, true, false]);
		expect(result.rejectionBullish).toEqual([false, false, false, false]);
	});

	it("returns empty structure for an empty series", () => {
		expect(analyzeStructure([])).toEqual({
			swingHighs: [],
			swingLows: [],
			fvgBullish: [],
			fvgBearish: [],
			obBullish: [],
			obBearish: [],
			sweepBullish: [],
			sweepBearish: [],
			rejectionBullish: [],
			rejectionBearish: [],
			fvgZones: [],
			obZones: [],
			srZones: [],
			sweeps: [],
		});
	});

	it("is deterministic across repeated runs", () => {
		const long = Array.from({ length: 120 }, (_, i) => {
			const mid = 100 + 4 * Math.sin(i / 5);
			return candle(mid - 0.3, mid + 1 + (i % 3) * 0.2, mid - 1 - (i % 4) * 0.2, mid + 0.3);
		});
		expect(JSON.stringify(analyzeStructure(long))).toBe(JSON.stringify(analyzeStructure(long)));
	});
});
