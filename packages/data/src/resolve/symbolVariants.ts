const MARKET_SEPARATORS = [".", "/", ":"];

/**
 * Spellings to try for a user-entered identifier, in priority order: one
 * suffixed form per suffix when the input names no market, then the input
 * itself (trimmed and upper-cased).
 *
 * @example buildSymbolVariants(" reliance ", [".NS"]) // ["RELIANCE.NS", "RELIANCE"]
 */
export const buildSymbolVariants = (
	input: string,
	suffixes: readonly string[]
): string[] => {
	const query = input.trim().toUpperCase();
	if (!query) {
		return [];
	}
	const hasMarket = MARKET_SEPARATORS.some((separator) =>
		query.includes(separator)
	);
	const suffixed = hasMarket
		? []
		: suffixes
				.map((suffix) => suffix.trim().toUpperCase())
				.filter((suffix) => suffix.length > 0)
				.map((suffix) => `${query}${suffix}`);
	return Array.from(new Set([...suffixed, query]));
};
