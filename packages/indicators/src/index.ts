export type { SeriesValue } from "./types";
export { rsiSeries } from "./rsi";
export { emaSeries } from "./ema";
export { smaSeries } from "./sma";
export { cumulativeVwapSeries, typicalPrice } from "./vwap";
export type { VwapBar } from "./vwap";
export {
	rollingMaxSeries,
	rollingMinSeries,
	windowCompleteSeries,
} from "./extrema";
