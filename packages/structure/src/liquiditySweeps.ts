import type { Candle, LiquiditySweep } from "@marketlens/core";

export interface LiquiditySweepFlags {
	sweepBullish: boolean[];
	sweepBearish: boolean[];
	sweeps: LiquiditySweep[];
}

/**
 * Break-and-reclaim of the prior `lookback` candles' extreme. The window
 * excludes the current candle; indices before the window fills stay false.
 */
export const findLiquiditySweeps = (
	candles: readonly Candle[],
	lookback: number
): LiquiditySweepFlags => {
	const length = candles.length;
	const sweepBullish = new Array<boolean>(length).fill(false);
	const sweepBearish = new Array<boolean>(length).fill(false);
	const sweeps: LiquiditySweep[] = [];

	for (let i = lookback; i < length; i += 1) {
		let rollingMin = Number.POSITIVE_INFINITY;
		let rollingMax = Number.NEGATIVE_INFINITY;
		for (let j = i - lookback; j < i; j += 1) {
			rollingMin = Math.min(rollingMin, candles[j].low);
			rollingMax = Math.max(rollingMax, candles[j].high);
		}

		const current = candles[i];
		if (current.low < rollingMin && current.close > rollingMin) {
			sweepBullish[i] = true;
			sweeps.push({ kind: "bullish", index: i, sweptLevel: rollingMin });
		}
		if (current.high > rollingMax && current.close < rollingMax) {
			sweepBearish[i] = true;
			sweeps.push({ kind: "bearish", index: i, sweptLevel: rollingMax });
		}
	}

	return { sweepBullish, sweepBearish, sweeps };
};
