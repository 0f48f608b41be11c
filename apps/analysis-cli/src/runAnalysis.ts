import {
	DEFAULT_ANALYSIS_CONFIG,
	type AnalysisConfig,
	type Candle,
} from "@marketlens/core";
import { computeIndicators } from "@marketlens/indicators";
import { PATTERN_NAMES, detectPatterns } from "@marketlens/patterns";
import { analyzeStructure, nearestZone } from "@marketlens/structure";
import type { Operation } from "./cliArgs";
import {
	toWireIndicators,
	toWirePatterns,
	toWireStructure,
	type WireAnalysis,
} from "./wire";

export interface AnalysisRun {
	result: WireAnalysis;
	counts: Record<string, number | string>;
}

/**
 * Runs the requested operations over one candle series and collects the
 * counts reported in the `analysis_summary` log event.
 */
export const runAnalysis = (
	candles: readonly Candle[],
	operations: readonly Operation[],
	config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): AnalysisRun => {
	const result: WireAnalysis = {};
	const counts: Record<string, number | string> = {};

	if (operations.includes("indicators")) {
		const close = candles.map((candle) => candle.close);
		result.indicators = toWireIndicators(
			computeIndicators(
				{
					prices: close,
					high: candles.map((candle) => candle.high),
					low: candles.map((candle) => candle.low),
					close,
				},
				config
			)
		);
	}

	if (operations.includes("patterns")) {
		const flags = detectPatterns(candles);
		result.patterns = toWirePatterns(flags);
		counts.patterns = PATTERN_NAMES.reduce(
			(total, name) => total + flags[name].filter(Boolean).length,
			0
		);
	}

	if (operations.includes("structure")) {
		const structure = analyzeStructure(candles, config);
		result.structure = toWireStructure(structure);
		counts.fvgZones = structure.fvgZones.length;
		counts.obZones = structure.obZones.length;
		counts.srZones = structure.srZones.length;
		counts.sweeps = structure.sweeps.length;
		counts.rejections =
			structure.rejectionBullish.filter(Boolean).length +
			structure.rejectionBearish.filter(Boolean).length;
		counts.nearestSupport =
			nearestZone(structure.srZones, "support")?.level ?? "n/a";
		counts.nearestResistance =
			nearestZone(structure.srZones, "resistance")?.level ?? "n/a";
	}

	return { result, counts };
};
