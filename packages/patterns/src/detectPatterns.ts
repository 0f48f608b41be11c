import { createLogger, type Candle } from "@marketlens/core";
import {
	detectBearishEngulfing,
	detectBullishEngulfing,
	detectEveningStar,
	detectMorningStar,
} from "./multiCandle";
import {
	detectBearishPinBar,
	detectBullishPinBar,
	detectDragonflyDoji,
	detectGravestoneDoji,
	detectHammer,
	detectHangingMan,
	detectInvertedHammer,
} from "./singleCandle";

const logger = createLogger("analysis:patterns");

export interface PatternFlags {
	hammer: boolean[];
	invertedHammer: boolean[];
	hangingMan: boolean[];
	bullishEngulfing: boolean[];
	bearishEngulfing: boolean[];
	dragonflyDoji: boolean[];
	gravestoneDoji: boolean[];
	morningStar: boolean[];
	eveningStar: boolean[];
	pinBarBullish: boolean[];
	pinBarBearish: boolean[];
}

export type PatternName = keyof PatternFlags;

export const PATTERN_NAMES: readonly PatternName[] = [
	"hammer",
	"invertedHammer",
	"hangingMan",
	"bullishEngulfing",
	"bearishEngulfing",
	"dragonflyDoji",
	"gravestoneDoji",
	"morningStar",
	"eveningStar",
	"pinBarBullish",
	"pinBarBearish",
];

const countFlags = (flags: PatternFlags): Partial<Record<PatternName, number>> => {
	const counts: Partial<Record<PatternName, number>> = {};
	for (const name of PATTERN_NAMES) {
		counts[name] = flags[name].filter(Boolean).length;
	}
	return counts;
};

export const detectPatterns = (candles: readonly Candle[]): PatternFlags => {
	const flags: PatternFlags = {
		hammer: detectHammer(candles),
		invertedHammer: detectInvertedHammer(candles),
		hangingMan: detectHangingMan(candles),
		bullishEngulfing: detectBullishEngulfing(candles),
		bearishEngulfing: detectBearishEngulfing(candles),
		dragonflyDoji: detectDragonflyDoji(candles),
		gravestoneDoji: detectGravestoneDoji(candles),
		morningStar: detectMorningStar(candles),
		eveningStar: detectEveningStar(candles),
		pinBarBullish: detectBullishPinBar(candles),
		pinBarBearish: detectBearishPinBar(candles),
	};
	logger.debug("patterns_detected", {
		length: candles.length,
		counts: countFlags(flags),
	});
	return flags;
};
