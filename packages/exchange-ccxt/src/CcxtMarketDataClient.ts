import type { OHLCV } from "ccxt";
import {
	timeframeToMs,
	type BarRequest,
	type MarketDataClient,
	type RawBarTable,
} from "@barlab/core";
import type { DataProviderLogger } from "@barlab/data";
import { classifyCcxtError } from "./classifyError";
import { mapOhlcvRowsToTable } from "./ccxtMapper";
import { createCcxtExchange } from "./exchanges";

const DEFAULT_BATCH_SIZE = 1000;
const DEFAULT_MAX_ITERATIONS = 500;

/**
 * The slice of a ccxt exchange the client reads from.
 */
export interface OhlcvExchange {
	id: string;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface CcxtMarketDataClientOptions {
	exchange?: OhlcvExchange;
	exchangeId?: string;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
}

export class CcxtMarketDataClient implements MarketDataClient {
	private readonly exchange: OhlcvExchange;
	private readonly batchSize: number;
	private readonly maxIterations: number;
	private readonly logger?: DataProviderLogger;

	constructor(options: CcxtMarketDataClientOptions) {
		if (options.exchange) {
			this.exchange = options.exchange;
		} else if (options.exchangeId) {
			this.exchange = createCcxtExchange(options.exchangeId);
		} else {
			throw new Error("CcxtMarketDataClient needs an exchange or an exchangeId");
		}
		this.batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
		this.maxIterations = Math.max(
			options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
			1
		);
		this.logger = options.logger;
	}

	async fetchBars(request: BarRequest): Promise<RawBarTable> {
		const { symbol, timeframe } = request;
		const stepMs = timeframeToMs(timeframe);
		const rows: OHLCV[] = [];
		let cursor = request.since ?? 0;

		for (let iteration = 0; iteration < this.maxIterations; iteration += 1) {
			const batch = await this.fetchPage(symbol, timeframe, cursor);
			if (!batch.length) {
				return mapOhlcvRowsToTable(rows);
			}
			rows.push(...batch);
			const lastTimestamp = batch[batch.length - 1]?.[0];
			if (batch.length < this.batchSize || lastTimestamp === undefined) {
				return mapOhlcvRowsToTable(rows);
			}
			cursor = Math.max(lastTimestamp + stepMs, cursor + stepMs);
		}

		this.logger?.warn?.("ohlcv_fetch_iterations_exhausted", {
			exchange: this.exchange.id,
			symbol,
			timeframe,
			maxIterations: this.maxIterations,
			rows: rows.length,
		});
		return mapOhlcvRowsToTable(rows);
	}

	private async fetchPage(
		symbol: string,
		timeframe: string,
		since: number
	): Promise<OHLCV[]> {
		try {
			return await this.exchange.fetchOHLCV(
				symbol,
				timeframe,
				since,
				this.batchSize
			);
		} catch (error) {
			const classified = classifyCcxtError(error, symbol);
			if (!classified) {
				throw error;
			}
			this.logger?.debug?.("ohlcv_fetch_failed", {
				exchange: this.exchange.id,
				symbol,
				timeframe,
				kind: classified.kind,
				error: classified.message,
			});
			throw classified;
		}
	}
}
