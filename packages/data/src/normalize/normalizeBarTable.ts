import {
	BAR_FIELDS,
	EPOCH_SECONDS_THRESHOLD,
	type Bar,
	type BarField,
	type ColumnKey,
	type RawBarTable,
} from "@barlab/core";
import { NormalizationError } from "../errors";
import type { NormalizationReport, NormalizedSeries } from "../types";

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;

const isBarField = (value: string): value is BarField =>
	BAR_FIELDS.some((field) => field === value);

export const hasNestedHeaders = (columns: readonly ColumnKey[]): boolean =>
	columns.some((column) => typeof column !== "string");

/**
 * Collapses multi-level headers to their outer level. Flat headers come
 * back unchanged, so repairing twice equals repairing once.
 */
export const repairHeaders = (columns: readonly ColumnKey[]): string[] =>
	columns.map((column) =>
		typeof column === "string" ? column : column[0] ?? ""
	);

const fromEpochNumber = (value: number): number | null => {
	if (!Number.isFinite(value)) {
		return null;
	}
	return Math.abs(value) < EPOCH_SECONDS_THRESHOLD
		? Math.round(value * 1000)
		: Math.round(value);
};

/**
 * Coerces a raw index value to epoch milliseconds. Numbers whose magnitude
 * is below 1e11 are read as epoch seconds, so millisecond values between
 * 1969-10-31 and 1973-03-03 come out scaled by 1000; pass such instants as
 * ISO strings or `Date`s.
 */
export const coerceTimestamp = (value: unknown): number | null => {
	if (typeof value === "number") {
		return fromEpochNumber(value);
	}
	if (value instanceof Date) {
		const time = value.getTime();
		return Number.isFinite(time) ? time : null;
	}
	if (typeof value === "string") {
		const trimmed = value.trim();
		if (!trimmed) {
			return null;
		}
		if (NUMERIC_PATTERN.test(trimmed)) {
			return fromEpochNumber(Number(trimmed));
		}
		const parsed = Date.parse(trimmed);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

const coerceNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

type FieldPositions = Record<BarField, number>;

const locateFields = (
	names: string[],
	symbol: string
): { positions: FieldPositions; dropped: string[] } => {
	const found = new Map<BarField, number>();
	const dropped: string[] = [];
	names.forEach((name, position) => {
		const field = name.trim().toLowerCase();
		if (isBarField(field) && !found.has(field)) {
			found.set(field, position);
		} else {
			dropped.push(name);
		}
	});

	const missing = BAR_FIELDS.filter((field) => !found.has(field));
	if (missing.length) {
		throw new NormalizationError(
			`Bar table for ${symbol} is missing columns: ${missing.join(", ")}`,
			{ symbol }
		);
	}
	const position = (field: BarField): number => found.get(field) ?? -1;
	return {
		positions: {
			open: position("open"),
			high: position("high"),
			low: position("low"),
			close: position("close"),
			volume: position("volume"),
		},
		dropped,
	};
};

const readBar = (
	timestamp: number,
	row: readonly unknown[],
	positions: FieldPositions
): Bar | null => {
	const open = coerceNumber(row[positions.open]);
	const high = coerceNumber(row[positions.high]);
	const low = coerceNumber(row[positions.low]);
	const close = coerceNumber(row[positions.close]);
	const volume = coerceNumber(row[positions.volume]);
	if (open === null || high === null || low === null || close === null) {
		return null;
	}
	if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
		return null;
	}
	if (volume === null || volume < 0) {
		return null;
	}
	return { timestamp, open, high, low, close, volume };
};

const emptyReport = (): NormalizationReport => ({
	flattenedHeaders: false,
	droppedColumns: [],
	droppedRows: 0,
	duplicateTimestamps: 0,
	reordered: false,
});

/**
 * Repairs raw provider output into an ascending, duplicate-free bar series
 * with exactly the open/high/low/close/volume fields.
 *
 * An empty table yields an empty series. A table with rows but without all
 * five fields, or whose index does not line up with its rows, throws a
 * {@link NormalizationError}.
 */
export const normalizeBarTable = (
	table: RawBarTable,
	meta: { symbol: string; timeframe: string }
): NormalizedSeries => {
	const report = emptyReport();
	if (!table.rows.length) {
		return { series: { ...meta, bars: [] }, report };
	}
	if (table.index.length !== table.rows.length) {
		throw new NormalizationError(
			`Bar table for ${meta.symbol} has ${table.index.length} index entries for ${table.rows.length} rows`,
			{ symbol: meta.symbol }
		);
	}

	report.flattenedHeaders = hasNestedHeaders(table.columns);
	const { positions, dropped } = locateFields(
		repairHeaders(table.columns),
		meta.symbol
	);
	report.droppedColumns = dropped;

	const byTimestamp = new Map<number, Bar>();
	let previous = Number.NEGATIVE_INFINITY;
	table.rows.forEach((row, rowIndex) => {
		const timestamp = coerceTimestamp(table.index[rowIndex]);
		const bar = timestamp === null ? null : readBar(timestamp, row, positions);
		if (bar === null) {
			report.droppedRows += 1;
			return;
		}
		if (bar.timestamp < previous) {
			report.reordered = true;
		}
		previous = bar.timestamp;
		if (byTimestamp.has(bar.timestamp)) {
			report.duplicateTimestamps += 1;
		}
		byTimestamp.set(bar.timestamp, bar);
	});

	const bars = Array.from(byTimestamp.values()).sort(
		(a, b) => a.timestamp - b.timestamp
	);
	return { series: { ...meta, bars }, report };
};
