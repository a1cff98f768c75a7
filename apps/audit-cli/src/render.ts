import type {
	AnalysisOk,
	AnalysisResult,
	IndicatorRow,
} from "@barlab/analysis";
import type { UnresolvedResult } from "@barlab/data";
import type { SeriesValue } from "@barlab/indicators";

export const NOT_AVAILABLE = "n/a";

const LABEL_WIDTH = 24;

export const EXIT_CODES = {
	ok: 0,
	usage: 1,
	unresolved: 2,
	transient: 3,
} as const;

export const exitCodeFor = (result: AnalysisResult): number => {
	switch (result.status) {
		case "ok":
			return EXIT_CODES.ok;
		case "transient_error":
			return EXIT_CODES.transient;
		case "not_found":
		case "malformed_input":
			return EXIT_CODES.unresolved;
	}
};

export const formatValue = (value: SeriesValue, digits = 2): string =>
	value === null || !Number.isFinite(value) ? NOT_AVAILABLE : value.toFixed(digits);

export const formatChange = (value: SeriesValue): string => {
	if (value === null || !Number.isFinite(value)) {
		return NOT_AVAILABLE;
	}
	return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
};

const formatTimestamp = (timestamp: number): string =>
	new Date(timestamp).toISOString();

const line = (label: string, value: string): string =>
	`  ${label.padEnd(LABEL_WIDTH)} ${value}`;

const rsiTail = (result: AnalysisOk, count: number): IndicatorRow[] =>
	result.augmented.rows.slice(-count);

/**
 * Plain-text report: headline, the four indicator groups and the trailing
 * RSI values, one entry per line.
 */
export const renderReport = (result: AnalysisOk, rsiRows: number): string[] => {
	const { summary, augmented } = result;
	const { last } = summary;
	const { settings } = augmented;
	const tail = rsiTail(result, rsiRows);

	return [
		`${result.symbol} ${augmented.timeframe} as of ${formatTimestamp(last.timestamp)}`,
		`Last price ${formatValue(last.close)} (${formatChange(summary.changePct)})`,
		"",
		"Price action",
		line("Open", formatValue(last.open)),
		line("High", formatValue(last.high)),
		line("Low", formatValue(last.low)),
		line("Close", formatValue(last.close)),
		line("Volume", formatValue(last.volume, 0)),
		"Institutional",
		line("VWAP (cumulative)", formatValue(last.vwapCum)),
		line(`EMA ${settings.emaSpan}`, formatValue(last.ema20)),
		line(`SMA ${settings.smaPeriod}`, formatValue(last.sma50)),
		"Momentum",
		line(`RSI ${settings.rsiPeriod}`, formatValue(last.rsi14)),
		line("Zone", summary.momentum ?? NOT_AVAILABLE),
		"Yearly range",
		line(`High ${settings.extremaWindow}`, formatValue(last.high252)),
		line(`Low ${settings.extremaWindow}`, formatValue(last.low252)),
		line(
			"Below high",
			summary.offHighPct === null ? NOT_AVAILABLE : `${formatValue(summary.offHighPct)}%`
		),
		line("Full window", last.extremaWindowComplete ? "yes" : "no"),
		"",
		`RSI ${settings.rsiPeriod}, last ${tail.length}`,
		...tail.map((row) => line(formatTimestamp(row.timestamp), formatValue(row.rsi14))),
	];
};

export const renderJson = (result: AnalysisOk, rsiRows: number): string =>
	JSON.stringify(
		{
			status: result.status,
			input: result.input,
			symbol: result.symbol,
			timeframe: result.augmented.timeframe,
			bars: result.augmented.rows.length,
			settings: result.augmented.settings,
			summary: result.summary,
			rsiTail: rsiTail(result, rsiRows).map((row) => ({
				timestamp: row.timestamp,
				rsi: row.rsi14,
			})),
		},
		null,
		2
	);

export const renderFailure = (result: UnresolvedResult): string => {
	switch (result.status) {
		case "not_found":
			return `No bars found for "${result.input}" (tried ${result.attempted.join(", ") || NOT_AVAILABLE})`;
		case "transient_error":
			return `Market data unavailable for ${result.symbol} after ${result.attempts} attempt(s): ${result.error.message}`;
		case "malformed_input":
			return `Unusable market data for ${result.symbol}: ${result.error.message}`;
	}
};
