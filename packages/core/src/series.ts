import type { WarmupSeries } from "./types";

export const createWarmupSeries = (length: number): WarmupSeries =>
	new Array<number | null>(length).fill(null);

/**
 * Collapses a warm-up series into the sentinel form consumers expect:
 * undefined positions become `sentinel` (0 unless told otherwise).
 */
export const withSentinel = (series: WarmupSeries, sentinel = 0): number[] =>
	series.map((value) => (value === null ? sentinel : value));

export const assertPeriod = (period: number, label: string): void => {
	if (!Number.isInteger(period) || period <= 0) {
		throw new Error(`${label} period must be a positive integer, got ${period}`);
	}
};

export const average = (nums: readonly number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};

/** Rounds half away from zero, so negative levels mirror positive ones. */
export const roundTo = (value: number, decimals: number): number => {
	const factor = 10 ** decimals;
	return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
};
