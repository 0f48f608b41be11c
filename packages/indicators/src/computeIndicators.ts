import {
	DEFAULT_ANALYSIS_CONFIG,
	createLogger,
	type AnalysisConfig,
} from "@marketlens/core";
import { atr } from "./atr";
import { ema } from "./ema";
import { rsi } from "./rsi";

const logger = createLogger("analysis:indicators");

export interface IndicatorInput {
	prices: readonly number[];
	high: readonly number[];
	low: readonly number[];
	close: readonly number[];
}

export interface IndicatorSnapshot {
	ema50: number[];
	ema200: number[];
	rsi14: number[];
	atr14: number[];
}

/**
 * EMA/RSI run over `prices`, ATR over high/low/close. Field names keep the
 * default windows; the actual windows come from `config.indicators`.
 */
export const computeIndicators = (
	input: IndicatorInput,
	config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): IndicatorSnapshot => {
	const { emaFastPeriod, emaSlowPeriod, rsiPeriod, atrPeriod } = config.indicators;
	const snapshot: IndicatorSnapshot = {
		ema50: ema(input.prices, emaFastPeriod),
		ema200: ema(input.prices, emaSlowPeriod),
		rsi14: rsi(input.prices, rsiPeriod),
		atr14: atr(input.high, input.low, input.close, atrPeriod),
	};
	logger.debug("indicators_computed", {
		length: input.prices.length,
		emaFastPeriod,
		emaSlowPeriod,
		rsiPeriod,
		atrPeriod,
	});
	return snapshot;
};
