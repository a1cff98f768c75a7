import ccxt, { type Exchange } from "ccxt";

const EXCHANGES = {
	binance: ccxt.binance,
	mexc: ccxt.mexc,
};

export type SupportedExchangeId = keyof typeof EXCHANGES;

export const SUPPORTED_EXCHANGE_IDS = Object.keys(EXCHANGES);

const isSupportedExchangeId = (id: string): id is SupportedExchangeId =>
	id in EXCHANGES;

/**
 * Builds an unauthenticated spot client; market data needs no credentials.
 */
export const createCcxtExchange = (id: string): Exchange => {
	const normalized = id.trim().toLowerCase();
	if (!isSupportedExchangeId(normalized)) {
		throw new Error(
			`Unsupported exchange id "${id}". Expected one of: ${SUPPORTED_EXCHANGE_IDS.join(", ")}`
		);
	}
	const ExchangeClass = EXCHANGES[normalized];
	return new ExchangeClass({
		enableRateLimit: true,
		options: {
			defaultType: "spot",
		},
	});
};
