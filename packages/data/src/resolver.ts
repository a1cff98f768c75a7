import { setTimeout as delay } from "node:timers/promises";
import type { RawBarTable } from "@barlab/core";
import { isMarketDataError, type MarketDataError } from "./errors";
import { normalizeBarTable } from "./normalize/normalizeBarTable";
import { resolveLookback } from "./resolve/lookback";
import { buildSymbolVariants } from "./resolve/symbolVariants";
import type {
	DataProviderLogger,
	MarketDataClient,
	NormalizedSeries,
	ResolveRequest,
	ResolveResult,
	SeriesResolverConfig,
	SeriesSource,
} from "./types";

const DEFAULT_RETRY_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

type FetchOutcome =
	| { kind: "table"; table: RawBarTable }
	| { kind: "empty" }
	| { kind: "transient"; error: MarketDataError; attempts: number }
	| { kind: "malformed"; error: MarketDataError };

/**
 * Turns a user-entered identifier into a normalized bar series.
 *
 * Spelling variants are tried one at a time. Transient failures are retried
 * with exponential back-off and then reported as such, without falling
 * through to the next spelling; malformed payloads are reported at once.
 */
export class SeriesResolver implements SeriesSource {
	private readonly client: MarketDataClient;
	private readonly suffixes: string[];
	private readonly lookbackDays?: number;
	private readonly attempts: number;
	private readonly baseDelayMs: number;
	private readonly logger?: DataProviderLogger;
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(config: SeriesResolverConfig) {
		if (!config.client) {
			throw new Error("SeriesResolver client is required");
		}
		this.client = config.client;
		this.suffixes = config.symbolSuffixes ?? [];
		this.lookbackDays = config.intradayLookbackDays;
		this.attempts = Math.max(config.retry?.attempts ?? DEFAULT_RETRY_ATTEMPTS, 1);
		this.baseDelayMs = Math.max(
			config.retry?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
			0
		);
		this.logger = config.logger;
		this.now = config.now ?? Date.now;
		this.sleep = config.sleep ?? ((ms) => delay(ms));
	}

	async resolve(request: ResolveRequest): Promise<ResolveResult> {
		const { input, timeframe } = request;
		const variants = buildSymbolVariants(input, this.suffixes);
		const lookback = resolveLookback(timeframe, this.now(), this.lookbackDays);
		const since = lookback.kind === "bounded" ? lookback.since : undefined;

		for (const symbol of variants) {
			const outcome = await this.fetchVariant(symbol, timeframe, since);
			if (outcome.kind === "empty") {
				this.logger?.debug?.("symbol_variant_empty", { input, symbol, timeframe });
				continue;
			}
			if (outcome.kind === "transient") {
				this.logger?.error?.("series_fetch_failed", {
					input,
					symbol,
					timeframe,
					attempts: outcome.attempts,
					error: outcome.error.message,
				});
				return {
					status: "transient_error",
					input,
					symbol,
					attempts: outcome.attempts,
					error: outcome.error,
				};
			}
			if (outcome.kind === "malformed") {
				return this.malformed(input, symbol, outcome.error);
			}

			let normalized: NormalizedSeries;
			try {
				normalized = normalizeBarTable(outcome.table, { symbol, timeframe });
			} catch (error) {
				if (!isMarketDataError(error)) {
					throw error;
				}
				return this.malformed(input, symbol, error);
			}
			if (!normalized.series.bars.length) {
				this.logger?.debug?.("symbol_variant_empty", { input, symbol, timeframe });
				continue;
			}

			this.logger?.info?.("series_resolved", {
				input,
				symbol,
				timeframe,
				lookback: lookback.kind,
				bars: normalized.series.bars.length,
				droppedRows: normalized.report.droppedRows,
			});
			this.logger?.debug?.("series_normalized", { symbol, ...normalized.report });
			return {
				status: "resolved",
				input,
				symbol,
				series: normalized.series,
				report: normalized.report,
			};
		}

		this.logger?.warn?.("symbol_not_found", { input, timeframe, attempted: variants });
		return { status: "not_found", input, attempted: variants };
	}

	private async fetchVariant(
		symbol: string,
		timeframe: string,
		since: number | undefined
	): Promise<FetchOutcome> {
		for (let attempt = 1; ; attempt += 1) {
			try {
				const table = await this.client.fetchBars({ symbol, timeframe, since });
				return { kind: "table", table };
			} catch (error) {
				if (!isMarketDataError(error)) {
					throw error;
				}
				if (error.kind === "not_found") {
					return { kind: "empty" };
				}
				if (error.kind === "malformed") {
					return { kind: "malformed", error };
				}
				if (attempt >= this.attempts) {
					return { kind: "transient", error, attempts: attempt };
				}
				const waitMs = this.baseDelayMs * 2 ** (attempt - 1);
				this.logger?.warn?.("series_fetch_retry", {
					symbol,
					timeframe,
					attempt,
					waitMs,
					error: error.message,
				});
				await this.sleep(waitMs);
			}
		}
	}

	private malformed(
		input: string,
		symbol: string,
		error: MarketDataError
	): ResolveResult {
		this.logger?.error?.("series_malformed", {
			input,
			symbol,
			error: error.message,
		});
		return { status: "malformed_input", input, symbol, error };
	}
}
