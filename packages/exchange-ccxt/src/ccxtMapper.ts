import type { OHLCV } from "ccxt";
import type { RawBarTable } from "@barlab/core";

export const OHLCV_COLUMNS = ["Open", "High", "Low", "Close", "Volume"];

/**
 * Lays ccxt OHLCV rows out as a raw bar table. Gaps the venue left
 * undefined come through as null for the normalizer to drop.
 */
export const mapOhlcvRowsToTable = (rows: readonly OHLCV[]): RawBarTable => ({
	columns: OHLCV_COLUMNS,
	index: rows.map(([timestamp]) => timestamp ?? null),
	rows: rows.map(([, open, high, low, close, volume]) => [
		open ?? null,
		high ?? null,
		low ?? null,
		close ?? null,
		volume ?? null,
	]),
});
