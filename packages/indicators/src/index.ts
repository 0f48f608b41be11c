export { ema, emaSeries } from "./ema";
export { rsi, rsiSeries } from "./rsi";
export { atr, atrSeries } from "./atr";
export { computeIndicators } from "./computeIndicators";
export type { IndicatorInput, IndicatorSnapshot } from "./computeIndicators";
