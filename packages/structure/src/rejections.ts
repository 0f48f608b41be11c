import type { Candle, SwingSeries, WarmupSeries } from "@marketlens/core";

export interface RejectionOptions {
	/** Prior candles searched for the latest swing level. */
	window: number;
	/** Touch tolerance as a multiple of the candle's ATR. */
	atrFactor: number;
}

export interface RejectionFlags {
	rejectionBullish: boolean[];
	rejectionBearish: boolean[];
}

const latestSwing = (series: SwingSeries, from: number, to: number): number | null => {
	for (let j = to - 1; j >= from; j -= 1) {
		const level = series[j];
		if (level !== null) {
			return level;
		}
	}
	return null;
};

/**
 * Touch-and-reverse at the most recent swing level within `window` prior
 * candles. A bullish rejection reaches down to within `atrFactor * ATR` of
 * the latest swing low and closes above it; bearish mirrors that at swing
 * highs. Candles without an ATR value never fire.
 */
export const findRejections = (
	candles: readonly Candle[],
	swingHighs: SwingSeries,
	swingLows: SwingSeries,
	atr: WarmupSeries,
	options: RejectionOptions
): RejectionFlags => {
	const length = candles.length;
	const rejectionBullish = new Array<boolean>(length).fill(false);
	const rejectionBearish = new Array<boolean>(length).fill(false);

	for (let i = 1; i < length; i += 1) {
		const range = atr[i];
		if (range === null) {
			continue;
		}
		const tolerance = range * options.atrFactor;
		const from = Math.max(0, i - options.window);
		const current = candles[i];

		const support = latestSwing(swingLows, from, i);
		if (support !== null && current.low <= support + tolerance && current.close > support) {
			rejectionBullish[i] = true;
		}

		const resistance = latestSwing(swingHighs, from, i);
		if (
			resistance !== null &&
			current.high >= resistance - tolerance &&
			current.close < resistance
		) {
			rejectionBearish[i] = true;
		}
	}

	return { rejectionBullish, rejectionBearish };
};
