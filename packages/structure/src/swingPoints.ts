import type { SwingSeries } from "@marketlens/core";

export interface SwingPoints {
	swingHighs: SwingSeries;
	swingLows: SwingSeries;
}

/**
 * Pivot detection over a `2 * legs + 1` window. A pivot must be strictly
 * above (highs) or below (lows) every other candle in its window, so ties
 * never produce a swing point. The first and last `legs` indices are never
 * evaluated.
 */
export const findSwingPoints = (
	high: readonly number[],
	low: readonly number[],
	legs: number
): SwingPoints => {
	const length = high.length;
	const swingHighs: SwingSeries = new Array<number | null>(length).fill(null);
	const swingLows: SwingSeries = new Array<number | null>(length).fill(null);

	for (let i = legs; i < length - legs; i += 1) {
		let isSwingHigh = true;
		let isSwingLow = true;

		for (let j = i - legs; j <= i + legs; j += 1) {
			if (j === i) {
				continue;
			}
			if (high[j] >= high[i]) {
				isSwingHigh = false;
			}
			if (low[j] <= low[i]) {
				isSwingLow = false;
			}
			if (!isSwingHigh && !isSwingLow) {
				break;
			}
		}

		if (isSwingHigh) {
			swingHighs[i] = high[i];
		}
		if (isSwingLow) {
			swingLows[i] = low[i];
		}
	}

	return { swingHighs, swingLows };
};
