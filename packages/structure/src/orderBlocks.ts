import { isBearish, isBullish, type Candle, type OrderBlockZone } from "@marketlens/core";

/**
 * The last opposing candle before an engulfing close past its open. The
 * zone covers that candle's body and is anchored on it, not on the
 * engulfing candle.
 */
export const findOrderBlocks = (candles: readonly Candle[]): OrderBlockZone[] => {
	const zones: OrderBlockZone[] = [];

	for (let i = 1; i < candles.length; i += 1) {
		const block = candles[i - 1];
		const current = candles[i];

		if (isBearish(block) && isBullish(current) && current.close > block.open) {
			zones.push({ kind: "bullish", top: block.open, bottom: block.close, index: i - 1 });
		}

		if (isBullish(block) && isBearish(current) && current.close < block.open) {
			zones.push({ kind: "bearish", top: block.close, bottom: block.open, index: i - 1 });
		}
	}

	return zones;
};
