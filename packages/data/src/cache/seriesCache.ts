import type {
	ResolveRequest,
	ResolveResult,
	SeriesSource,
} from "../types";

export interface CachedResolverOptions {
	ttlMs: number;
	now?: () => number;
}

export interface CachedSeriesSource extends SeriesSource {
	clear(): void;
	size(): number;
}

interface CachedEntry {
	result: ResolveResult;
	fetchedAt: number;
}

const cacheKey = (request: ResolveRequest): string =>
	`${request.input.trim().toUpperCase()}|${request.timeframe.trim().toLowerCase()}`;

/**
 * Memoizes resolved and not-found results per (symbol, timeframe) for
 * `ttlMs`. Transient and malformed results always go back to the source.
 * Hits are reported against the caller's own input string.
 */
export const createCachedResolver = (
	source: SeriesSource,
	options: CachedResolverOptions
): CachedSeriesSource => {
	const cache = new Map<string, CachedEntry>();
	const now = options.now ?? Date.now;
	const ttlMs = Math.max(options.ttlMs, 0);

	return {
		resolve: async (request) => {
			const key = cacheKey(request);
			const existing = cache.get(key);
			const at = now();
			if (existing && at - existing.fetchedAt < ttlMs) {
				return { ...existing.result, input: request.input };
			}

			const result = await source.resolve(request);
			if (result.status === "resolved" || result.status === "not_found") {
				cache.set(key, { result, fetchedAt: at });
			} else {
				cache.delete(key);
			}
			return result;
		},
		clear: () => cache.clear(),
		size: () => cache.size,
	};
};
