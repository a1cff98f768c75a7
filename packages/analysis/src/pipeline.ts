import {
	DEFAULT_INDICATOR_SETTINGS,
	type BarSeries,
	type IndicatorSettings,
} from "@barlab/core";
import {
	cumulativeVwapSeries,
	emaSeries,
	rollingMaxSeries,
	rollingMinSeries,
	rsiSeries,
	smaSeries,
	windowCompleteSeries,
} from "@barlab/indicators";
import type { AugmentedSeries, IndicatorRow } from "./types";

/**
 * Decorates every bar with RSI, cumulative VWAP, EMA, SMA and the rolling
 * yearly extrema. Each value depends only on bars at or before its own
 * index. The input series is left untouched.
 *
 * The yearly extrema accept a partial window (minimum one bar), so early
 * rows report the range seen so far; `extremaWindowComplete` marks the rows
 * where the full window is available.
 */
export const applyIndicators = (
	series: BarSeries,
	overrides: Partial<IndicatorSettings> = {}
): AugmentedSeries => {
	const settings: IndicatorSettings = { ...DEFAULT_INDICATOR_SETTINGS, ...overrides };
	const bars = series.bars;
	const closes = bars.map((bar) => bar.close);

	const rsi = rsiSeries(closes, settings.rsiPeriod);
	const vwap = cumulativeVwapSeries(bars);
	const ema = emaSeries(closes, settings.emaSpan);
	const sma = smaSeries(closes, settings.smaPeriod);
	const highs = rollingMaxSeries(
		bars.map((bar) => bar.high),
		settings.extremaWindow
	);
	const lows = rollingMinSeries(
		bars.map((bar) => bar.low),
		settings.extremaWindow
	);
	const complete = windowCompleteSeries(bars.length, settings.extremaWindow);

	const rows = bars.map(
		(bar, index): IndicatorRow => ({
			timestamp: bar.timestamp,
			open: bar.open,
			high: bar.high,
			low: bar.low,
			close: bar.close,
			volume: bar.volume,
			rsi14: rsi[index],
			vwapCum: vwap[index],
			ema20: ema[index],
			sma50: sma[index],
			high252: highs[index],
			low252: lows[index],
			extremaWindowComplete: complete[index],
		})
	);

	return { symbol: series.symbol, timeframe: series.timeframe, settings, rows };
};
