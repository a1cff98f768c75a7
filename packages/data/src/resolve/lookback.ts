import { DAY_MS, isIntradayTimeframe } from "@barlab/core";

export type LookbackWindow =
	| { kind: "bounded"; days: number; since: number }
	| { kind: "max" };

export const DEFAULT_INTRADAY_LOOKBACK_DAYS = 60;

/**
 * Intraday timeframes fetch a bounded recent window; daily and coarser
 * timeframes fetch everything the venue has.
 */
export const resolveLookback = (
	timeframe: string,
	now: number,
	intradayLookbackDays = DEFAULT_INTRADAY_LOOKBACK_DAYS
): LookbackWindow => {
	if (!isIntradayTimeframe(timeframe)) {
		return { kind: "max" };
	}
	if (!Number.isInteger(intradayLookbackDays) || intradayLookbackDays <= 0) {
		throw new Error(
			`Intraday lookback must be a positive number of days, got ${intradayLookbackDays}`
		);
	}
	return {
		kind: "bounded",
		days: intradayLookbackDays,
		since: now - intradayLookbackDays * DAY_MS,
	};
};
