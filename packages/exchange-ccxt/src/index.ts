export { CcxtMarketDataClient } from "./CcxtMarketDataClient";
export type {
	CcxtMarketDataClientOptions,
	OhlcvExchange,
} from "./CcxtMarketDataClient";
export { classifyCcxtError } from "./classifyError";
export { OHLCV_COLUMNS, mapOhlcvRowsToTable } from "./ccxtMapper";
export {
	SUPPORTED_EXCHANGE_IDS,
	createCcxtExchange,
} from "./exchanges";
export type { SupportedExchangeId } from "./exchanges";
