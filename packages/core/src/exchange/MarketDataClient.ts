import type { RawBarTable } from "../types";

export interface BarRequest {
	/** Venue-specific spelling, e.g. "BTC/USDT" or "RELIANCE.NS" */
	symbol: string;
	/** Timeframe string, e.g. "15m", "1h", "1d" */
	timeframe: string;
	/** First timestamp to include; omitted means the full available history */
	since?: number;
}

/**
 * Market data collaborator. Implementations return whatever the venue
 * produced; repair happens downstream. An unknown symbol yields an empty
 * table or a `not_found` classified error, never a partial one.
 */
export interface MarketDataClient {
	fetchBars(request: BarRequest): Promise<RawBarTable>;
}
