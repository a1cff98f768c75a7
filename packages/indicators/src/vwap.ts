import type { SeriesValue } from "./types";

export interface VwapBar {
	high: number;
	low: number;
	close: number;
	volume: number;
}

export const typicalPrice = (bar: VwapBar): number =>
	(bar.high + bar.low + bar.close) / 3;

/**
 * Volume-weighted average price accumulated from the first bar of the
 * series, with no session reset. Undefined while cumulative volume is zero.
 */
export const cumulativeVwapSeries = (bars: readonly VwapBar[]): SeriesValue[] => {
	let pvSum = 0;
	let volumeSum = 0;

	return bars.map((bar) => {
		pvSum += typicalPrice(bar) * bar.volume;
		volumeSum += bar.volume;
		return volumeSum > 0 ? pvSum / volumeSum : null;
	});
};
