import { DAY_MS, type BarRequest, type RawBarTable } from "@barlab/core";
import { describe, expect, it, vi } from "vitest";
import { MarketDataError, NormalizationError } from "./errors";
import { toLegacyPair } from "./legacy";
import { SeriesResolver } from "./resolver";
import type { MarketDataClient } from "./types";

const START = Date.UTC(2024, 0, 1);
const NOW = Date.UTC(2024, 5, 1);
const EMPTY: RawBarTable = { columns: [], index: [], rows: [] };

const buildTable = (count: number): RawBarTable => ({
	columns: ["Open", "High", "Low", "Close", "Volume"],
	index: Array.from({ length: count }, (_, idx) => START + idx * DAY_MS),
	rows: Array.from({ length: count }, (_, idx) => [
		100 + idx,
		101 + idx,
		99 + idx,
		100 + idx,
		1_000,
	]),
});

type Scripted = RawBarTable | Error;

class ScriptedMarketDataClient implements MarketDataClient {
	readonly calls: BarRequest[] = [];

	constructor(private readonly script: Record<string, Scripted[]>) {}

	async fetchBars(request: BarRequest): Promise<RawBarTable> {
		this.calls.push(request);
		const queue = this.script[request.symbol] ?? [];
		const next = queue.length > 1 ? queue.shift() : queue[0];
		if (next === undefined) {
			return EMPTY;
		}
		if (next instanceof Error) {
			throw next;
		}
		return next;
	}
}

const transient = (symbol: string): MarketDataError =>
	new MarketDataError("transient", `timeout fetching ${symbol}`, { symbol });

const createResolver = (client: MarketDataClient, sleep = vi.fn(async () => {})) =>
	new SeriesResolver({
		client,
		symbolSuffixes: [".NS"],
		retry: { attempts: 3, baseDelayMs: 100 },
		now: () => NOW,
		sleep,
	});

describe("SeriesResolver", () => {
	it("accepts the first spelling that returns bars", async () => {
		const client = new ScriptedMarketDataClient({ "RELIANCE.NS": [buildTable(5)] });

		const result = await createResolver(client).resolve({
			input: "reliance",
			timeframe: "1d",
		});

		expect(result.status).toBe("resolved");
		expect(toLegacyPair(result)[1]).toBe("RELIANCE.NS");
		expect(client.calls.map((call) => call.symbol)).toEqual(["RELIANCE.NS"]);
	});

	it("falls back to the raw spelling when the suffixed one is empty", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [new MarketDataError("not_found", "bad symbol")],
			RELIANCE: [buildTable(3)],
		});

		const result = await createResolver(client).resolve({
			input: "RELIANCE",
			timeframe: "1d",
		});

		expect(result.status === "resolved" && result.symbol).toBe("RELIANCE");
		expect(client.calls.map((call) => call.symbol)).toEqual([
			"RELIANCE.NS",
			"RELIANCE",
		]);
	});

	it("reports not found with the caller's input when every spelling is empty", async () => {
		const client = new ScriptedMarketDataClient({});

		const result = await createResolver(client).resolve({
			input: " zzz ",
			timeframe: "1d",
		});

		expect(result).toEqual({
			status: "not_found",
			input: " zzz ",
			attempted: ["ZZZ.NS", "ZZZ"],
		});
		expect(toLegacyPair(result)).toEqual([null, " zzz "]);
	});

	it("retries transient failures with exponential back-off", async () => {
		const sleep = vi.fn(async () => {});
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [transient("RELIANCE.NS"), transient("RELIANCE.NS"), buildTable(4)],
		});

		const result = await createResolver(client, sleep).resolve({
			input: "RELIANCE",
			timeframe: "1d",
		});

		expect(result.status).toBe("resolved");
		expect(sleep.mock.calls).toEqual([[100], [200]]);
		expect(client.calls).toHaveLength(3);
	});

	it("reports a transient error once retries are exhausted", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [transient("RELIANCE.NS")],
			RELIANCE: [buildTable(4)],
		});

		const result = await createResolver(client).resolve({
			input: "RELIANCE",
			timeframe: "1d",
		});

		expect(result.status).toBe("transient_error");
		if (result.status === "transient_error") {
			expect(result.attempts).toBe(3);
			expect(result.symbol).toBe("RELIANCE.NS");
			expect(result.error.message).toBe("timeout fetching RELIANCE.NS");
		}
		expect(client.calls.map((call) => call.symbol)).toEqual([
			"RELIANCE.NS",
			"RELIANCE.NS",
			"RELIANCE.NS",
		]);
	});

	it("reports a table it cannot repair as malformed input", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [
				{ columns: ["Open", "High"], index: [START], rows: [[100, 101]] },
			],
		});

		const result = await createResolver(client).resolve({
			input: "RELIANCE",
			timeframe: "1d",
		});

		expect(result.status).toBe("malformed_input");
		if (result.status === "malformed_input") {
			expect(result.error).toBeInstanceOf(NormalizationError);
		}
	});

	it("does not retry a malformed payload", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [new MarketDataError("malformed", "unexpected body")],
		});

		const result = await createResolver(client).resolve({
			input: "RELIANCE",
			timeframe: "1d",
		});

		expect(result.status).toBe("malformed_input");
		expect(client.calls).toHaveLength(1);
	});

	it("propagates errors it cannot classify", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [new TypeError("boom")],
		});

		await expect(
			createResolver(client).resolve({ input: "RELIANCE", timeframe: "1d" })
		).rejects.toThrowError("boom");
	});

	it("bounds intraday requests and asks for full history otherwise", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [buildTable(2)],
		});
		const resolver = createResolver(client);

		await resolver.resolve({ input: "RELIANCE", timeframe: "15m" });
		await resolver.resolve({ input: "RELIANCE", timeframe: "1d" });

		expect(client.calls[0]?.since).toBe(NOW - 60 * DAY_MS);
		expect(client.calls[1]?.since).toBeUndefined();
	});

	it("repairs nested headers before handing the series back", async () => {
		const client = new ScriptedMarketDataClient({
			"RELIANCE.NS": [
				{
					columns: [
						["Open", "RELIANCE.NS"],
						["High", "RELIANCE.NS"],
						["Low", "RELIANCE.NS"],
						["Close", "RELIANCE.NS"],
						["Volume", "RELIANCE.NS"],
					],
					index: [START],
					rows: [[100, 101, 99, 100.5, 10]],
				},
			],
		});

		const result = await createResolver(client).resolve({
			input: "RELIANCE",
			timeframe: "1d",
		});

		expect(result.status === "resolved" && result.report.flattenedHeaders).toBe(
			true
		);
		expect(result.status === "resolved" && result.series.bars).toEqual([
			{ timestamp: START, open: 100, high: 101, low: 99, close: 100.5, volume: 10 },
		]);
	});
});
