import { assertPositivePeriod, type SeriesValue } from "./types";

type Choose = (current: number, candidate: number) => number;

const rollingExtreme = (
	values: readonly number[],
	window: number,
	minPeriods: number,
	pick: Choose
): SeriesValue[] => {
	assertPositivePeriod("Rolling window", window);
	if (!Number.isInteger(minPeriods) || minPeriods < 1 || minPeriods > window) {
		throw new Error(
			`minPeriods must be between 1 and ${window}, got ${minPeriods}`
		);
	}

	return values.map((_, index) => {
		const start = Math.max(0, index - window + 1);
		if (index - start + 1 < minPeriods) {
			return null;
		}
		let extreme = values[start];
		for (let j = start + 1; j <= index; j += 1) {
			extreme = pick(extreme, values[j]);
		}
		return extreme;
	});
};

/**
 * Trailing maximum over up to `window` bars. With the default `minPeriods`
 * of 1 a partial window at the start of the series still yields a value.
 */
export const rollingMaxSeries = (
	values: readonly number[],
	window: number,
	minPeriods = 1
): SeriesValue[] => rollingExtreme(values, window, minPeriods, Math.max);

export const rollingMinSeries = (
	values: readonly number[],
	window: number,
	minPeriods = 1
): SeriesValue[] => rollingExtreme(values, window, minPeriods, Math.min);

/**
 * Marks which rows have a full `window`-bar look-back.
 */
export const windowCompleteSeries = (length: number, window: number): boolean[] => {
	assertPositivePeriod("Rolling window", window);
	return Array.from({ length }, (_, index) => index >= window - 1);
};
