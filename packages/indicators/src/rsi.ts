import { assertPositivePeriod, type SeriesValue } from "./types";

/**
 * Relative strength index over a simple (non-Wilder) trailing mean of
 * close-to-close gains and losses. The first bar contributes a zero change,
 * so the first value lands at index `period - 1`.
 *
 * A window with no losses saturates at 100 when it has gains; a window with
 * neither is undefined.
 */
export function rsiSeries(values: readonly number[], period = 14): SeriesValue[] {
	assertPositivePeriod("RSI", period);

	const gains: number[] = [];
	const losses: number[] = [];
	for (let i = 0; i < values.length; i += 1) {
		const change = i === 0 ? 0 : values[i] - values[i - 1];
		gains.push(Math.max(change, 0));
		losses.push(Math.max(-change, 0));
	}

	const rsis: SeriesValue[] = [];
	for (let i = 0; i < values.length; i += 1) {
		if (i < period - 1) {
			rsis.push(null);
			continue;
		}
		let gainSum = 0;
		let lossSum = 0;
		for (let j = i - period + 1; j <= i; j += 1) {
			gainSum += gains[j];
			lossSum += losses[j];
		}
		const avgGain = gainSum / period;
		const avgLoss = lossSum / period;

		if (avgLoss === 0) {
			rsis.push(avgGain > 0 ? 100 : null);
			continue;
		}
		rsis.push(100 - 100 / (1 + avgGain / avgLoss));
	}

	return rsis;
}
