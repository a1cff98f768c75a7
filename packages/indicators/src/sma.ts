import { assertPositivePeriod, type SeriesValue } from "./types";

export function smaSeries(values: readonly number[], period: number): SeriesValue[] {
	assertPositivePeriod("SMA", period);

	return values.map((_, index) => {
		if (index < period - 1) {
			return null;
		}
		let sum = 0;
		for (let j = index - period + 1; j <= index; j += 1) {
			sum += values[j];
		}
		return sum / period;
	});
}
