/**
 * Timeframe helpers. All functions operate on UTC epoch milliseconds only.
 */

import { DAY_MS, HOUR_MS, MINUTE_MS, WEEK_MS } from "./constants";

export type TimeframeUnit = "m" | "h" | "d" | "w";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	ms: number;
}

const TIMEFRAME_PATTERN = /^(\d+)([mhdw])$/;

const UNIT_MS: Record<TimeframeUnit, number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: WEEK_MS,
};

const isTimeframeUnit = (value: string): value is TimeframeUnit =>
	value in UNIT_MS;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "15m", "1h", "1d", "1w"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "15m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];
	if (!isTimeframeUnit(unit)) {
		throw new Error(`Invalid timeframe unit: "${unit}" in "${timeframe}"`);
	}
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * True for timeframes shorter than one day.
 */
export const isIntradayTimeframe = (timeframe: string): boolean =>
	timeframeToMs(timeframe) < DAY_MS;
