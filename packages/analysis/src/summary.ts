import {
	DEFAULT_MOMENTUM_THRESHOLDS,
	type MomentumThresholds,
} from "@barlab/core";
import type { SeriesValue } from "@barlab/indicators";
import type { AugmentedSeries, MomentumZone, SeriesSummary } from "./types";

const percentChange = (from: number, to: number): SeriesValue =>
	from === 0 ? null : ((to - from) / from) * 100;

export const classifyMomentum = (
	rsi: SeriesValue,
	thresholds: MomentumThresholds = DEFAULT_MOMENTUM_THRESHOLDS
): MomentumZone | null => {
	if (rsi === null) {
		return null;
	}
	if (rsi < thresholds.oversold) {
		return "oversold";
	}
	if (rsi > thresholds.overbought) {
		return "overbought";
	}
	return "neutral";
};

/**
 * Point-in-time values read from the last two rows. Returns null for an
 * empty series.
 */
export const summarizeSeries = (
	augmented: AugmentedSeries,
	overrides: Partial<MomentumThresholds> = {}
): SeriesSummary | null => {
	const { rows } = augmented;
	const last = rows[rows.length - 1];
	if (!last) {
		return null;
	}
	const previous = rows.length > 1 ? rows[rows.length - 2] : null;
	const thresholds = { ...DEFAULT_MOMENTUM_THRESHOLDS, ...overrides };
	const high = last.high252;

	return {
		last,
		previous,
		changePct: previous ? percentChange(previous.close, last.close) : null,
		offHighPct: high === null || high === 0 ? null : ((high - last.close) / high) * 100,
		momentum: classifyMomentum(last.rsi14, thresholds),
	};
};
