import {
	assertPeriod,
	createWarmupSeries,
	withSentinel,
	type WarmupSeries,
} from "@marketlens/core";

const computeTrueRanges = (
	high: readonly number[],
	low: readonly number[],
	close: readonly number[]
): number[] => {
	// Index 0 has no previous close and never contributes.
	const trueRanges = new Array<number>(high.length).fill(0);
	for (let i = 1; i < high.length; i += 1) {
		const previousClose = close[i - 1];
		const highLow = high[i] - low[i];
		const highClose = Math.abs(high[i] - previousClose);
		const lowClose = Math.abs(low[i] - previousClose);
		trueRanges[i] = Math.max(highLow, highClose, lowClose);
	}
	return trueRanges;
};

export function atrSeries(
	high: readonly number[],
	low: readonly number[],
	close: readonly number[],
	period = 14
): WarmupSeries {
	assertPeriod(period, "ATR");
	const series = createWarmupSeries(high.length);
	if (high.length < period + 1) {
		return series;
	}

	const trueRanges = computeTrueRanges(high, low, close);

	let atr = 0;
	for (let i = 1; i <= period; i += 1) {
		atr += trueRanges[i];
	}
	atr /= period;
	series[period] = atr;

	const alpha = 1 / period;
	for (let i = period + 1; i < high.length; i += 1) {
		atr = atr * (1 - alpha) + trueRanges[i] * alpha;
		series[i] = atr;
	}

	return series;
}

/** Wilder ATR aligned with the input; positions before `period` read 0. */
export function atr(
	high: readonly number[],
	low: readonly number[],
	close: readonly number[],
	period = 14
): number[] {
	return withSentinel(atrSeries(high, low, close, period));
}
