import type {
	FairValueGapZone,
	LiquiditySweep,
	OrderBlockZone,
	SupportResistanceZone,
	SwingSeries,
} from "@marketlens/core";
import type { IndicatorSnapshot } from "@marketlens/indicators";
import type { PatternFlags } from "@marketlens/patterns";
import type { StructureAnalysis } from "@marketlens/structure";

export interface WireIndicators {
	ema_50: number[];
	ema_200: number[];
	rsi_14: number[];
	atr_14: number[];
}

export interface WirePatterns {
	hammer: boolean[];
	inverted_hammer: boolean[];
	hanging_man: boolean[];
	bullish_engulfing: boolean[];
	bearish_engulfing: boolean[];
	dragonfly_doji: boolean[];
	gravestone_doji: boolean[];
	morning_star: boolean[];
	evening_star: boolean[];
	pin_bar_bullish: boolean[];
	pin_bar_bearish: boolean[];
}

export interface WireFairValueGap {
	zone_type: FairValueGapZone["kind"];
	top: number;
	bottom: number;
	index: number;
	gap_size: number;
}

export interface WireOrderBlock {
	zone_type: OrderBlockZone["kind"];
	top: number;
	bottom: number;
	index: number;
}

export interface WireSupportResistance {
	zone_type: SupportResistanceZone["kind"];
	level: number;
	top: number;
	bottom: number;
	index: number;
	strength: number;
	distance: number;
}

export interface WireSweep {
	zone_type: LiquiditySweep["kind"];
	index: number;
	swept_level: number;
}

export interface WireStructure {
	swing_highs: SwingSeries;
	swing_lows: SwingSeries;
	fvg_bullish: boolean[];
	fvg_bearish: boolean[];
	ob_bullish: boolean[];
	ob_bearish: boolean[];
	sweep_bullish: boolean[];
	sweep_bearish: boolean[];
	rejection_bullish: boolean[];
	rejection_bearish: boolean[];
	fvg_zones: WireFairValueGap[];
	ob_zones: WireOrderBlock[];
	sr_zones: WireSupportResistance[];
	sweeps: WireSweep[];
}

export interface WireAnalysis {
	indicators?: WireIndicators;
	patterns?: WirePatterns;
	structure?: WireStructure;
}

export const toWireIndicators = (snapshot: IndicatorSnapshot): WireIndicators => ({
	ema_50: snapshot.ema50,
	ema_200: snapshot.ema200,
	rsi_14: snapshot.rsi14,
	atr_14: snapshot.atr14,
});

export const toWirePatterns = (flags: PatternFlags): WirePatterns => ({
	hammer: flags.hammer,
	inverted_hammer: flags.invertedHammer,
	hanging_man: flags.hangingMan,
	bullish_engulfing: flags.bullishEngulfing,
	bearish_engulfing: flags.bearishEngulfing,
	dragonfly_doji: flags.dragonflyDoji,
	gravestone_doji: flags.gravestoneDoji,
	morning_star: flags.morningStar,
	evening_star: flags.eveningStar,
	pin_bar_bullish: flags.pinBarBullish,
	pin_bar_bearish: flags.pinBarBearish,
});

const toWireFairValueGap = (zone: FairValueGapZone): WireFairValueGap => ({
	zone_type: zone.kind,
	top: zone.top,
	bottom: zone.bottom,
	index: zone.index,
	gap_size: zone.gapSize,
});

const toWireOrderBlock = (zone: OrderBlockZone): WireOrderBlock => ({
	zone_type: zone.kind,
	top: zone.top,
	bottom: zone.bottom,
	index: zone.index,
});

const toWireSupportResistance = (
	zone: SupportResistanceZone
): WireSupportResistance => ({
	zone_type: zone.kind,
	level: zone.level,
	top: zone.top,
	bottom: zone.bottom,
	index: zone.index,
	strength: zone.strength,
	distance: zone.distance,
});

const toWireSweep = (sweep: LiquiditySweep): WireSweep => ({
	zone_type: sweep.kind,
	index: sweep.index,
	swept_level: sweep.sweptLevel,
});

export const toWireStructure = (analysis: StructureAnalysis): WireStructure => ({
	swing_highs: analysis.swingHighs,
	swing_lows: analysis.swingLows,
	fvg_bullish: analysis.fvgBullish,
	fvg_bearish: analysis.fvgBearish,
	ob_bullish: analysis.obBullish,
	ob_bearish: analysis.obBearish,
	sweep_bullish: analysis.sweepBullish,
	sweep_bearish: analysis.sweepBearish,
	rejection_bullish: analysis.rejectionBullish,
	rejection_bearish: analysis.rejectionBearish,
	fvg_zones: analysis.fvgZones.map(toWireFairValueGap),
	ob_zones: analysis.obZones.map(toWireOrderBlock),
	sr_zones: analysis.srZones.map(toWireSupportResistance),
	sweeps: analysis.sweeps.map(toWireSweep),
});
