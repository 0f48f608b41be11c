export { measureCandle } from "./anatomy";
export type { CandleAnatomy } from "./anatomy";
export {
	detectHammer,
	detectInvertedHammer,
	detectHangingMan,
	detectDragonflyDoji,
	detectGravestoneDoji,
	detectBullishPinBar,
	detectBearishPinBar,
} from "./singleCandle";
export {
	detectBullishEngulfing,
	detectBearishEngulfing,
	detectMorningStar,
	detectEveningStar,
} from "./multiCandle";
export { detectPatterns, PATTERN_NAMES } from "./detectPatterns";
export type { PatternFlags, PatternName } from "./detectPatterns";
