import type {
	Bar,
	IndicatorSettings,
	MomentumThresholds,
} from "@barlab/core";
import type {
	DataProviderLogger,
	SeriesSource,
	UnresolvedResult,
} from "@barlab/data";
import type { SeriesValue } from "@barlab/indicators";

/**
 * A bar decorated with its indicator values. Column names carry the default
 * periods; with other settings they hold the configured ones.
 */
export interface IndicatorRow extends Bar {
	rsi14: SeriesValue;
	vwapCum: SeriesValue;
	ema20: SeriesValue;
	sma50: SeriesValue;
	high252: SeriesValue;
	low252: SeriesValue;
	/** False while the yearly extrema are computed over a partial window */
	extremaWindowComplete: boolean;
}

export interface AugmentedSeries {
	symbol: string;
	timeframe: string;
	settings: IndicatorSettings;
	rows: IndicatorRow[];
}

export type MomentumZone = "oversold" | "neutral" | "overbought";

export interface SeriesSummary {
	last: IndicatorRow;
	previous: IndicatorRow | null;
	/** Percent change from the previous close to the last close */
	changePct: SeriesValue;
	/** Percent distance of the last close below the rolling high */
	offHighPct: SeriesValue;
	momentum: MomentumZone | null;
}

export interface AnalysisRequest {
	input: string;
	timeframe: string;
}

export interface AnalysisOk {
	status: "ok";
	input: string;
	symbol: string;
	augmented: AugmentedSeries;
	summary: SeriesSummary;
}

export type AnalysisResult = AnalysisOk | UnresolvedResult;

export interface AnalysisDeps {
	source: SeriesSource;
	indicators?: Partial<IndicatorSettings>;
	momentum?: Partial<MomentumThresholds>;
	logger?: DataProviderLogger;
}
