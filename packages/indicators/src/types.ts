/**
 * One value per input bar; `null` marks a bar the indicator is not defined
 * for (warm-up rows, zero denominators).
 */
export type SeriesValue = number | null;

export const assertPositivePeriod = (name: string, period: number): void => {
	if (!Number.isInteger(period) || period <= 0) {
		throw new Error(`${name} period must be a positive integer, got ${period}`);
	}
};
