import { applyIndicators } from "./pipeline";
import { summarizeSeries } from "./summary";
import type { AnalysisDeps, AnalysisRequest, AnalysisResult } from "./types";

/**
 * Resolves the requested symbol, runs the indicator pipeline over the
 * resolved series and summarizes the last rows. Anything short of a
 * resolved series is handed back unchanged.
 */
export const analyzeSymbol = async (
	request: AnalysisRequest,
	deps: AnalysisDeps
): Promise<AnalysisResult> => {
	const resolved = await deps.source.resolve(request);
	if (resolved.status !== "resolved") {
		return resolved;
	}

	const augmented = applyIndicators(resolved.series, deps.indicators);
	const summary = summarizeSeries(augmented, deps.momentum);
	if (!summary) {
		return {
			status: "not_found",
			input: request.input,
			attempted: [resolved.symbol],
		};
	}

	deps.logger?.info?.("indicator_summary", {
		symbol: resolved.symbol,
		timeframe: request.timeframe,
		bars: augmented.rows.length,
		close: summary.last.close,
		changePct: summary.changePct,
		rsi: summary.last.rsi14,
		momentum: summary.momentum,
		offHighPct: summary.offHighPct,
	});

	return {
		status: "ok",
		input: request.input,
		symbol: resolved.symbol,
		augmented,
		summary,
	};
};
