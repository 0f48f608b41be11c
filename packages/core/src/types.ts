export interface Candle {
	open: number;
	high: number;
	low: number;
	close: number;
}

export interface MarketCandle extends Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	volume: number;
}

export type Direction = "bullish" | "bearish";

/**
 * Per-index value that only exists once enough history has accumulated.
 * `null` marks "not yet defined"; see `withSentinel` for the public form.
 */
export type WarmupSeries = Array<number | null>;

export type SwingSeries = Array<number | null>;

export interface FairValueGapZone {
	kind: Direction;
	top: number;
	bottom: number;
	/** Candle that completes the three-candle gap. */
	index: number;
	gapSize: number;
}

export interface OrderBlockZone {
	kind: Direction;
	top: number;
	bottom: number;
	/** The opposing candle that was engulfed. */
	index: number;
}

export type SupportResistanceKind = "support" | "resistance";

export interface SupportResistanceZone {
	kind: SupportResistanceKind;
	level: number;
	top: number;
	bottom: number;
	/** Index of the swing point that seeded the cluster. */
	index: number;
	strength: number;
	distance: number;
}

export interface LiquiditySweep {
	kind: Direction;
	index: number;
	sweptLevel: number;
}
