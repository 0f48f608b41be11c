import {
	DEFAULT_ANALYSIS_CONFIG,
	createLogger,
	type AnalysisConfig,
	type Candle,
	type FairValueGapZone,
	type LiquiditySweep,
	type OrderBlockZone,
	type SupportResistanceZone,
	type SwingSeries,
} from "@marketlens/core";
import { atrSeries } from "@marketlens/indicators";
import { findFairValueGaps } from "./fairValueGaps";
import { findLiquiditySweeps } from "./liquiditySweeps";
import { findOrderBlocks } from "./orderBlocks";
import { projectZones } from "./projection";
import { findRejections } from "./rejections";
import { clusterSupportResistance } from "./supportResistance";
import { findSwingPoints } from "./swingPoints";

const logger = createLogger("analysis:structure");

export interface StructureAnalysis {
	swingHighs: SwingSeries;
	swingLows: SwingSeries;
	fvgBullish: boolean[];
	fvgBearish: boolean[];
	obBullish: boolean[];
	obBearish: boolean[];
	sweepBullish: boolean[];
	sweepBearish: boolean[];
	rejectionBullish: boolean[];
	rejectionBearish: boolean[];
	fvgZones: FairValueGapZone[];
	obZones: OrderBlockZone[];
	srZones: SupportResistanceZone[];
	sweeps: LiquiditySweep[];
}

/**
 * Smart-money structure for one candle series. Support/resistance distances
 * are measured from the last close; rejection tolerance scales with the
 * configured ATR period.
 */
export const analyzeStructure = (
	candles: readonly Candle[],
	config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): StructureAnalysis => {
	const {
		pivotLegs,
		srTolerance,
		srMinTouches,
		srMaxZones,
		sweepLookback,
		rejectionWindow,
		rejectionAtrFactor,
	} = config.structure;
	const length = candles.length;
	const high = candles.map((candle) => candle.high);
	const low = candles.map((candle) => candle.low);

	const { swingHighs, swingLows } = findSwingPoints(high, low, pivotLegs);

	const fvgZones = findFairValueGaps(candles);
	const obZones = findOrderBlocks(candles);
	const { sweepBullish, sweepBearish, sweeps } = findLiquiditySweeps(
		candles,
		sweepLookback
	);

	const { rejectionBullish, rejectionBearish } = findRejections(
		candles,
		swingHighs,
		swingLows,
		atrSeries(
			high,
			low,
			candles.map((candle) => candle.close),
			config.indicators.atrPeriod
		),
		{ window: rejectionWindow, atrFactor: rejectionAtrFactor }
	);

	const lastCandle = candles.at(-1);
	const srZones = lastCandle
		? clusterSupportResistance(swingHighs, swingLows, lastCandle.close, {
				tolerance: srTolerance,
				minTouches: srMinTouches,
				maxZones: srMaxZones,
			})
		: [];

	const analysis: StructureAnalysis = {
		swingHighs,
		swingLows,
		fvgBullish: projectZones(
			fvgZones.filter((zone) => zone.kind === "bullish"),
			length
		),
		fvgBearish: projectZones(
			fvgZones.filter((zone) => zone.kind === "bearish"),
			length
		),
		obBullish: projectZones(
			obZones.filter((zone) => zone.kind === "bullish"),
			length
		),
		obBearish: projectZones(
			obZones.filter((zone) => zone.kind === "bearish"),
			length
		),
		sweepBullish,
		sweepBearish,
		rejectionBullish,
		rejectionBearish,
		fvgZones,
		obZones,
		srZones,
		sweeps,
	};

	logger.debug("structure_analyzed", {
		length,
		swingHighs: swingHighs.filter((value) => value !== null).length,
		swingLows: swingLows.filter((value) => value !== null).length,
		fvgZones: fvgZones.length,
		obZones: obZones.length,
		srZones: srZones.length,
		sweeps: sweeps.length,
		rejections:
			rejectionBullish.filter(Boolean).length + rejectionBearish.filter(Boolean).length,
	});

	return analysis;
};
