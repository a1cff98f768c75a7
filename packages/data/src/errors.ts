export type MarketDataErrorKind = "not_found" | "transient" | "malformed";

export interface MarketDataErrorOptions {
	symbol?: string;
	cause?: unknown;
}

/**
 * Classified failure from the market data collaborator. Adapters translate
 * venue errors into one of these so the resolver can decide whether to
 * retry, move on to the next symbol spelling, or give up.
 */
export class MarketDataError extends Error {
	readonly kind: MarketDataErrorKind;
	readonly symbol?: string;

	constructor(
		kind: MarketDataErrorKind,
		message: string,
		options: MarketDataErrorOptions = {}
	) {
		super(message, { cause: options.cause });
		this.name = "MarketDataError";
		this.kind = kind;
		this.symbol = options.symbol;
	}
}

/**
 * Raised when a raw bar table cannot be repaired into a bar series.
 */
export class NormalizationError extends MarketDataError {
	constructor(message: string, options: MarketDataErrorOptions = {}) {
		super("malformed", message, options);
		this.name = "NormalizationError";
	}
}

export const isMarketDataError = (error: unknown): error is MarketDataError =>
	error instanceof MarketDataError;
