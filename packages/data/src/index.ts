export * from "./types";
export { parseCandleRows, loadCandlesFromFile } from "./candleFile";
export type { CandleFileOptions } from "./candleFile";
export {
	CcxtMarketDataClient,
	SUPPORTED_EXCHANGES,
	createExchangeSource,
} from "./ccxtClient";
export { mapCcxtCandleToCandle, normalizeCandles } from "./utils/ccxtMapper";
