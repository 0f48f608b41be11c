import type { Candle } from "@marketlens/core";
import { measureCandle, type CandleAnatomy } from "./anatomy";

type ShapePredicate = (shape: CandleAnatomy, candle: Candle) => boolean;

/** A candle with no range never matches a single-candle shape. */
const scanShapes = (
	candles: readonly Candle[],
	predicate: ShapePredicate
): boolean[] =>
	candles.map((candle) => {
		const shape = measureCandle(candle);
		return shape.range !== 0 && predicate(shape, candle);
	});

const isHammerShape: ShapePredicate = ({ body, upperWick, lowerWick }) =>
	lowerWick > body * 2 && upperWick < body * 0.5;

const isInvertedHammerShape: ShapePredicate = ({ body, upperWick, lowerWick }) =>
	upperWick > body * 2 && lowerWick < body * 0.5;

export const detectHammer = (candles: readonly Candle[]): boolean[] =>
	scanShapes(candles, isHammerShape);

export const detectInvertedHammer = (candles: readonly Candle[]): boolean[] =>
	scanShapes(candles, isInvertedHammerShape);

/**
 * Shape-only: a hanging man is a hammer printed after an advance, but the
 * preceding trend is not evaluated, so this flags exactly the hammers.
 */
export const detectHangingMan = (candles: readonly Candle[]): boolean[] =>
	detectHammer(candles);

export const detectDragonflyDoji = (candles: readonly Candle[]): boolean[] =>
	scanShapes(
		candles,
		({ body, upperWick, lowerWick, range }) =>
			body < range * 0.05 && lowerWick > range * 0.7 && upperWick < range * 0.05
	);

export const detectGravestoneDoji = (candles: readonly Candle[]): boolean[] =>
	scanShapes(
		candles,
		({ body, upperWick, lowerWick, range }) =>
			body < range * 0.05 && upperWick > range * 0.7 && lowerWick < range * 0.05
	);

// Pin bars: long rejection wick with the close in the opposite third.
export const detectBullishPinBar = (candles: readonly Candle[]): boolean[] =>
	scanShapes(
		candles,
		({ body, lowerWick, range }, candle) =>
			lowerWick > body * 2 &&
			body < range * 0.3 &&
			candle.close > candle.low + range * 0.66
	);

export const detectBearishPinBar = (candles: readonly Candle[]): boolean[] =>
	scanShapes(
		candles,
		({ body, upperWick, range }, candle) =>
			upperWick > body * 2 &&
			body < range * 0.3 &&
			candle.close < candle.low + range * 0.33
	);
