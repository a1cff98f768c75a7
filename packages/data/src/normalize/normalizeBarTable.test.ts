import type { RawBarTable } from "@barlab/core";
import { describe, expect, it } from "vitest";
import { NormalizationError } from "../errors";
import {
	coerceTimestamp,
	normalizeBarTable,
	repairHeaders,
} from "./normalizeBarTable";

const META = { symbol: "RELIANCE.NS", timeframe: "1d" };
const JAN_2 = Date.UTC(2024, 0, 2);
const JAN_3 = Date.UTC(2024, 0, 3);
const FLAT_COLUMNS = ["Open", "High", "Low", "Close", "Volume"];

describe("repairHeaders", () => {
	const nested = [
		["Close", "RELIANCE.NS"],
		["High", "RELIANCE.NS"],
		["Low", "RELIANCE.NS"],
	];

	it("keeps the outer level of nested headers", () => {
		expect(repairHeaders(nested)).toEqual(["Close", "High", "Low"]);
	});

	it("leaves flat headers untouched", () => {
		expect(repairHeaders(FLAT_COLUMNS)).toEqual(FLAT_COLUMNS);
		expect(repairHeaders(repairHeaders(nested))).toEqual(repairHeaders(nested));
	});
});

describe("coerceTimestamp", () => {
	it("reads epoch milliseconds, epoch seconds and numeric strings", () => {
		expect(coerceTimestamp(1_704_067_200_000)).toBe(1_704_067_200_000);
		expect(coerceTimestamp(1_704_067_200)).toBe(1_704_067_200_000);
		expect(coerceTimestamp("1704067200000")).toBe(1_704_067_200_000);
	});

	it("reads instants before 1970 the same way in every form", () => {
		const early = Date.parse("1962-01-02T00:00:00Z");
		expect(early).toBe(-252_374_400_000);
		expect(coerceTimestamp("1962-01-02T00:00:00Z")).toBe(early);
		expect(coerceTimestamp(early)).toBe(early);
		expect(coerceTimestamp(-252_374_400)).toBe(early);
		expect(coerceTimestamp("-252374400000")).toBe(early);
	});

	it("reads small magnitudes as epoch seconds", () => {
		expect(coerceTimestamp(-5)).toBe(-5_000);
		expect(coerceTimestamp(Date.UTC(1972, 0, 3))).toBe(63_244_800_000_000);
		expect(coerceTimestamp(Date.UTC(1973, 2, 4))).toBe(Date.UTC(1973, 2, 4));
	});

	it("reads ISO strings and Date objects", () => {
		expect(coerceTimestamp("2024-01-02T00:00:00Z")).toBe(JAN_2);
		expect(coerceTimestamp(new Date(JAN_3))).toBe(JAN_3);
	});

	it("rejects values that are not instants", () => {
		expect(coerceTimestamp("not a date")).toBeNull();
		expect(coerceTimestamp("")).toBeNull();
		expect(coerceTimestamp(Number.NaN)).toBeNull();
		expect(coerceTimestamp({})).toBeNull();
	});
});

describe("normalizeBarTable", () => {
	it("flattens nested headers and sorts the index", () => {
		const table: RawBarTable = {
			columns: [
				["Close", "RELIANCE.NS"],
				["High", "RELIANCE.NS"],
				["Low", "RELIANCE.NS"],
				["Open", "RELIANCE.NS"],
				["Volume", "RELIANCE.NS"],
			],
			index: ["2024-01-03T00:00:00Z", "2024-01-02T00:00:00Z"],
			rows: [
				[102, 103, 100, 101, 1500],
				[101, 102, 99, 100, 1200],
			],
		};

		const { series, report } = normalizeBarTable(table, META);

		expect(series).toEqual({
			symbol: "RELIANCE.NS",
			timeframe: "1d",
			bars: [
				{ timestamp: JAN_2, open: 100, high: 102, low: 99, close: 101, volume: 1200 },
				{ timestamp: JAN_3, open: 101, high: 103, low: 100, close: 102, volume: 1500 },
			],
		});
		expect(report).toEqual({
			flattenedHeaders: true,
			droppedColumns: [],
			droppedRows: 0,
			duplicateTimestamps: 0,
			reordered: true,
		});
	});

	it("drops extra and repeated columns, keeping the first occurrence", () => {
		const table: RawBarTable = {
			columns: ["Open", "High", "Low", "Close", "Adj Close", "Close", "Volume"],
			index: [JAN_2],
			rows: [[100, 102, 99, 101, 100.5, 999, 1200]],
		};

		const { series, report } = normalizeBarTable(table, META);

		expect(series.bars[0]?.close).toBe(101);
		expect(report.droppedColumns).toEqual(["Adj Close", "Close"]);
		expect(report.flattenedHeaders).toBe(false);
	});

	it("drops rows with unreadable timestamps or invalid values", () => {
		const table: RawBarTable = {
			columns: FLAT_COLUMNS,
			index: [JAN_2, "not a date", JAN_3, JAN_3 + 86_400_000],
			rows: [
				[100, 102, 99, 101, 1200],
				[100, 102, 99, 101, 1200],
				[100, 102, 99, Number.NaN, 1200],
				["101", "103", "100", "102", -1],
			],
		};

		const { series, report } = normalizeBarTable(table, META);

		expect(series.bars.map((bar) => bar.timestamp)).toEqual([JAN_2]);
		expect(report.droppedRows).toBe(3);
	});

	it("keeps the last row for a repeated timestamp", () => {
		const table: RawBarTable = {
			columns: FLAT_COLUMNS,
			index: [JAN_2, JAN_3, JAN_3],
			rows: [
				[100, 102, 99, 101, 1200],
				[101, 103, 100, 102, 1500],
				[101, 104, 100, 103, 1600],
			],
		};

		const { series, report } = normalizeBarTable(table, META);

		expect(series.bars).toHaveLength(2);
		expect(series.bars[1]?.close).toBe(103);
		expect(report.duplicateTimestamps).toBe(1);
		expect(report.reordered).toBe(false);
	});

	it("returns an empty series for an empty table", () => {
		const { series } = normalizeBarTable({ columns: [], index: [], rows: [] }, META);
		expect(series.bars).toEqual([]);
	});

	it("throws when a bar field is missing", () => {
		const table: RawBarTable = {
			columns: ["Open", "High", "Low", "Close"],
			index: [JAN_2],
			rows: [[100, 102, 99, 101]],
		};
		expect(() => normalizeBarTable(table, META)).toThrowError(NormalizationError);
		expect(() => normalizeBarTable(table, META)).toThrowError(
			"Bar table for RELIANCE.NS is missing columns: volume"
		);
	});

	it("throws when the index does not line up with the rows", () => {
		const table: RawBarTable = {
			columns: FLAT_COLUMNS,
			index: [JAN_2],
			rows: [
				[100, 102, 99, 101, 1200],
				[101, 103, 100, 102, 1500],
			],
		};
		expect(() => normalizeBarTable(table, META)).toThrowError(
			"Bar table for RELIANCE.NS has 1 index entries for 2 rows"
		);
	});
});
