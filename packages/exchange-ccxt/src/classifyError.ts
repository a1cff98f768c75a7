import {
	BadResponse,
	BadSymbol,
	NetworkError,
	NullResponse,
} from "ccxt";
import { MarketDataError } from "@barlab/data";

/**
 * Maps ccxt failures onto market data error kinds. Timeouts, rate limits,
 * DDoS protection and maintenance windows all derive from NetworkError.
 * Returns null for errors that are not a market data concern.
 */
export const classifyCcxtError = (
	error: unknown,
	symbol: string
): MarketDataError | null => {
	if (error instanceof BadSymbol) {
		return new MarketDataError("not_found", error.message, { symbol, cause: error });
	}
	if (error instanceof NetworkError) {
		return new MarketDataError("transient", error.message, { symbol, cause: error });
	}
	if (error instanceof BadResponse || error instanceof NullResponse) {
		return new MarketDataError("malformed", error.message, { symbol, cause: error });
	}
	return null;
};
