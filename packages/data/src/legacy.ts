import type { BarSeries } from "@barlab/core";
import type { ResolveResult } from "./types";

/**
 * Collapses a tagged result into `[series | null, symbol-or-input]` for
 * callers that only distinguish "have data" from "show not found".
 */
export const toLegacyPair = (
	result: ResolveResult
): [BarSeries | null, string] =>
	result.status === "resolved"
		? [result.series, result.symbol]
		: [null, result.input];
