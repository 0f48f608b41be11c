import { bodyMidpoint, isBearish, isBullish, type Candle } from "@marketlens/core";
import { measureCandle } from "./anatomy";

const STAR_BODY_RATIO = 0.3;

/**
 * Runs `predicate` on every index with at least `history` earlier candles;
 * earlier indices are false.
 */
const scanWindows = (
	candles: readonly Candle[],
	history: number,
	predicate: (index: number) => boolean
): boolean[] => candles.map((_, index) => index >= history && predicate(index));

export const detectBullishEngulfing = (candles: readonly Candle[]): boolean[] =>
	scanWindows(candles, 1, (i) => {
		const prev = candles[i - 1];
		const curr = candles[i];
		return (
			isBearish(prev) &&
			isBullish(curr) &&
			curr.open < prev.close &&
			curr.close > prev.open
		);
	});

export const detectBearishEngulfing = (candles: readonly Candle[]): boolean[] =>
	scanWindows(candles, 1, (i) => {
		const prev = candles[i - 1];
		const curr = candles[i];
		return (
			isBullish(prev) &&
			isBearish(curr) &&
			curr.open > prev.close &&
			curr.close < prev.open
		);
	});

const isStarBody = (candle: Candle): boolean => {
	const { body, range } = measureCandle(candle);
	return body < range * STAR_BODY_RATIO;
};

export const detectMorningStar = (candles: readonly Candle[]): boolean[] =>
	scanWindows(candles, 2, (i) => {
		const first = candles[i - 2];
		const last = candles[i];
		return (
			isBearish(first) &&
			isStarBody(candles[i - 1]) &&
			isBullish(last) &&
			last.close > bodyMidpoint(first)
		);
	});

export const detectEveningStar = (candles: readonly Candle[]): boolean[] =>
	scanWindows(candles, 2, (i) => {
		const first = candles[i - 2];
		const last = candles[i];
		return (
			isBullish(first) &&
			isStarBody(candles[i - 1]) &&
			isBearish(last) &&
			last.close < bodyMidpoint(first)
		);
	});
