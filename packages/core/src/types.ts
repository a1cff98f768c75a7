export * from "./time";

/**
 * One trading interval's summary. Timestamps are UTC epoch milliseconds.
 */
export interface Bar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export const BAR_FIELDS = ["open", "high", "low", "close", "volume"] as const;

export type BarField = (typeof BAR_FIELDS)[number];

/**
 * Bars for one instrument at one timeframe, ascending by timestamp with no
 * duplicate timestamps.
 */
export interface BarSeries {
	symbol: string;
	timeframe: string;
	bars: readonly Bar[];
}

/**
 * A column header as upstream feeds hand it over: either a flat field name
 * or a multi-level tuple whose first entry is the outer (field-name) level,
 * e.g. `["Close", "RELIANCE.NS"]`.
 */
export type ColumnKey = string | readonly string[];

/**
 * Unrepaired provider output. `index[i]` is the raw timestamp of `rows[i]`
 * and may be epoch milliseconds or seconds, a numeric or ISO string, or a
 * Date.
 */
export interface RawBarTable {
	columns: readonly ColumnKey[];
	index: readonly unknown[];
	rows: readonly (readonly unknown[])[];
}
