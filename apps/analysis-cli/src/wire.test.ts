import { describe, expect, it } from "vitest";
import type { StructureAnalysis } from "@marketlens/structure";
import { toWireIndicators, toWireStructure } from "./wire";

describe("toWireIndicators", () => {
	it("renames series to their snake_case keys", () => {
		expect(
			toWireIndicators({ ema50: [0, 1], ema200: [0, 0], rsi14: [0, 50], atr14: [0, 2] })
		).toEqual({ ema_50: [0, 1], ema_200: [0, 0], rsi_14: [0, 50], atr_14: [0, 2] });
	});
});

describe("toWireStructure", () => {
	const analysis: StructureAnalysis = {
		swingHighs: [null, 12, null],
		swingLows: [null, null, null],
		fvgBullish: [false, false, true],
		fvgBearish: [false, false, false],
		obBullish: [true, false, false],
		obBearish: [false, false, false],
		sweepBullish: [false, false, false],
		sweepBearish: [false, false, true],
		rejectionBullish: [false, true, false],
		rejectionBearish: [false, false, false],
		fvgZones: [{ kind: "bullish", top: 12, bottom: 11, index: 2, gapSize: 1 }],
		obZones: [{ kind: "bullish", top: 10, bottom: 9.5, index: 0 }],
		srZones: [
			{
				kind: "resistance",
				level: 12.05,
				top: 12.1,
				bottom: 12,
				index: 1,
				strength: 2,
				distance: 0.55,
			},
		],
		sweeps: [{ kind: "bearish", index: 2, sweptLevel: 12.1 }],
	};

	it("keeps missing swing points as null", () => {
		expect(toWireStructure(analysis).swing_highs).toEqual([null, 12, null]);
	});

	it("renames zone fields", () => {
		const wire = toWireStructure(analysis);

		expect(wire.fvg_zones).toEqual([
			{ zone_type: "bullish", top: 12, bottom: 11, index: 2, gap_size: 1 },
		]);
		expect(wire.ob_zones).toEqual([
			{ zone_type: "bullish", top: 10, bottom: 9.5, index: 0 },
		]);
		expect(wire.sr_zones).toEqual([
			{
				zone_type: "resistance",
				level: 12.05,
				top: 12.1,
				bottom: 12,
				index: 1,
				strength: 2,
				distance: 0.55,
			},
		]);
		expect(wire.sweeps).toEqual([
			{ zone_type: "bearish", index: 2, swept_level: 12.1 },
		]);
	});

	it("serializes flags under snake_case keys", () => {
		const wire = toWireStructure(analysis);

		expect(Object.keys(wire)).toEqual([
			"swing_highs",
			"swing_lows",
			"fvg_bullish",
			"fvg_bearish",
			"ob_bullish",
			"ob_bearish",
			"sweep_bullish",
			"sweep_bearish",
			"rejection_bullish",
			"rejection_bearish",
			"fvg_zones",
			"ob_zones",
			"sr_zones",
			"sweeps",
		]);
		expect(wire.sweep_bearish).toEqual([false, false, true]);
		expect(wire.rejection_bullish).toEqual([false, true, false]);
	});
});
