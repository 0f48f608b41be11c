import { isBearish, isBullish, type Candle, type FairValueGapZone } from "@marketlens/core";

/**
 * Three-candle imbalances: a bullish gap leaves `low[i]` above `high[i-2]`
 * on a bullish candle, a bearish gap leaves `high[i]` below `low[i-2]` on a
 * bearish candle. Zones come out in index order.
 */
export const findFairValueGaps = (candles: readonly Candle[]): FairValueGapZone[] => {
	const zones: FairValueGapZone[] = [];

	for (let i = 2; i < candles.length; i += 1) {
		const current = candles[i];
		const origin = candles[i - 2];

		if (current.low > origin.high && isBullish(current)) {
			zones.push({
				kind: "bullish",
				top: current.low,
				bottom: origin.high,
				index: i,
				gapSize: current.low - origin.high,
			});
		}

		if (current.high < origin.low && isBearish(current)) {
			zones.push({
				kind: "bearish",
				top: origin.low,
				bottom: current.high,
				index: i,
				gapSize: origin.low - current.high,
			});
		}
	}

	return zones;
};
