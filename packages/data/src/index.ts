export * from "./types";
export {
	MarketDataError,
	NormalizationError,
	isMarketDataError,
} from "./errors";
export type { MarketDataErrorKind, MarketDataErrorOptions } from "./errors";
export {
	coerceTimestamp,
	hasNestedHeaders,
	normalizeBarTable,
	repairHeaders,
} from "./normalize/normalizeBarTable";
export { buildSymbolVariants } from "./resolve/symbolVariants";
export {
	DEFAULT_INTRADAY_LOOKBACK_DAYS,
	resolveLookback,
} from "./resolve/lookback";
export type { LookbackWindow } from "./resolve/lookback";
export { SeriesResolver } from "./resolver";
export { createCachedResolver } from "./cache/seriesCache";
export type {
	CachedResolverOptions,
	CachedSeriesSource,
} from "./cache/seriesCache";
export { toLegacyPair } from "./legacy";
