import { assertPositivePeriod, type SeriesValue } from "./types";

/**
 * Exponential moving average with `alpha = 2 / (span + 1)`, seeded from the
 * first value with no warm-up correction. Defined from the first bar.
 */
export function emaSeries(values: readonly number[], span: number): SeriesValue[] {
	assertPositivePeriod("EMA", span);

	const multiplier = 2 / (span + 1);
	const series: SeriesValue[] = [];
	let emaValue = 0;

	for (let i = 0; i < values.length; i += 1) {
		emaValue = i === 0 ? values[0] : (values[i] - emaValue) * multiplier + emaValue;
		series.push(emaValue);
	}

	return series;
}
