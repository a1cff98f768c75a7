import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BarRequest, MarketDataClient, RawBarTable } from "@barlab/core";
import { MarketDataError } from "@barlab/data";
import { runAudit } from "./main";

const CONFIG_DIR = fileURLToPath(new URL("../../../config", import.meta.url));
const DAY = 86_400_000;
const START = Date.UTC(2024, 0, 1);

const TABLE: RawBarTable = {
	columns: ["Open", "High", "Low", "Close", "Volume"],
	index: [START, START + DAY, START + 2 * DAY],
	rows: [
		[100, 101, 99, 100, 10],
		[100, 101, 99, 100, 10],
		[100, 111, 99, 110, 10],
	],
};

class FixtureClient implements MarketDataClient {
	readonly requests: BarRequest[] = [];

	constructor(private readonly failure?: MarketDataError) {}

	async fetchBars(request: BarRequest): Promise<RawBarTable> {
		this.requests.push(request);
		if (this.failure) {
			throw this.failure;
		}
		if (request.symbol !== "ABC/USDT") {
			throw new MarketDataError("not_found", `unknown market ${request.symbol}`);
		}
		return TABLE;
	}
}

const createRuntime = (client: MarketDataClient) => {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const sleep = vi.fn(async () => {});
	return {
		stdout,
		stderr,
		sleep,
		runtime: {
			createClient: () => client,
			logger: {},
			sleep,
			stdout: (text: string) => stdout.push(text),
			stderr: (text: string) => stderr.push(text),
		},
	};
};

describe("runAudit", () => {
	beforeEach(() => {
		vi.stubEnv("BARLAB_PROFILE", "");
		vi.stubEnv("BARLAB_EXCHANGE_ID", "");
		vi.stubEnv("BARLAB_SYMBOL_SUFFIXES", "");
		vi.stubEnv("BARLAB_CACHE_TTL_MS", "");
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("prints the text report for a resolved symbol", async () => {
		const client = new FixtureClient();
		const { runtime, stdout, stderr } = createRuntime(client);

		const code = await runAudit(["abc", "--config", CONFIG_DIR, "--rows", "2"], runtime);

		expect(code).toBe(0);
		expect(stderr).toEqual([]);
		expect(client.requests[0]).toEqual({
			symbol: "ABC/USDT",
			timeframe: "1d",
			since: undefined,
		});
		expect(stdout[0]).toBe("ABC/USDT 1d as of 2024-01-03T00:00:00.000Z");
		expect(stdout[1]).toBe("Last price 110.00 (+10.00%)");
		expect(stdout).toContain(`  ${"RSI 14".padEnd(24)} n/a`);
		expect(stdout.slice(-3)).toEqual([
			"RSI 14, last 2",
			`  ${"2024-01-02T00:00:00.000Z".padEnd(24)} n/a`,
			`  ${"2024-01-03T00:00:00.000Z".padEnd(24)} n/a`,
		]);
	});

	it("prints the summary as JSON", async () => {
		const { runtime, stdout } = createRuntime(new FixtureClient());

		const code = await runAudit(["abc", "--config", CONFIG_DIR, "--json"], runtime);

		expect(code).toBe(0);
		const payload = JSON.parse(stdout[0]);
		expect(payload).toMatchObject({
			status: "ok",
			input: "abc",
			symbol: "ABC/USDT",
			timeframe: "1d",
			bars: 3,
		});
		expect(payload.summary.changePct).toBeCloseTo(10);
		expect(payload.summary.momentum).toBeNull();
		expect(payload.rsiTail).toHaveLength(3);
	});

	it("keeps log records out of the JSON document", async () => {
		const logs = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
		const stdout: string[] = [];

		const code = await runAudit(["abc", "--config", CONFIG_DIR, "--json"], {
			createClient: () => new FixtureClient(),
			stdout: (text) => stdout.push(text),
		});

		expect(code).toBe(0);
		expect(stdout).toHaveLength(1);
		expect(JSON.parse(stdout.join("\n"))).toMatchObject({ symbol: "ABC/USDT", bars: 3 });
		expect(logs).toHaveBeenCalled();
		logs.mockRestore();
	});

	it("exits with 2 when no spelling has data", async () => {
		const { runtime, stderr } = createRuntime(new FixtureClient());

		const code = await runAudit(["zzz", "--config", CONFIG_DIR], runtime);

		expect(code).toBe(2);
		expect(stderr).toEqual(['No bars found for "zzz" (tried ZZZ/USDT, ZZZ)']);
	});

	it("exits with 3 after retrying transient failures", async () => {
		const { runtime, stderr, sleep } = createRuntime(
			new FixtureClient(new MarketDataError("transient", "request timed out"))
		);

		const code = await runAudit(["abc", "--config", CONFIG_DIR], runtime);

		expect(code).toBe(3);
		expect(sleep.mock.calls).toEqual([[500], [1000]]);
		expect(stderr).toEqual([
			"Market data unavailable for ABC/USDT after 3 attempt(s): request timed out",
		]);
	});

	it("exits with 1 on a usage error", async () => {
		const { runtime, stderr } = createRuntime(new FixtureClient());

		const code = await runAudit([], runtime);

		expect(code).toBe(1);
		expect(stderr[0]).toBe("Missing required <symbol>");
	});
});
