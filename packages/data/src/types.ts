import type {
	BarSeries,
	MarketDataClient,
	RetrySettings,
} from "@barlab/core";
import type { MarketDataError } from "./errors";

export type { MarketDataClient };

export interface DataProviderLogger {
	debug?: (event: string, payload?: Record<string, unknown>) => void;
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface NormalizationReport {
	/** Multi-level headers were collapsed to their outer level */
	flattenedHeaders: boolean;
	/** Flattened names of columns that are not bar fields, or repeat one */
	droppedColumns: string[];
	/** Rows with an unreadable timestamp or invalid price/volume */
	droppedRows: number;
	/** Rows replaced by a later row carrying the same timestamp */
	duplicateTimestamps: number;
	/** The raw index was not in ascending order */
	reordered: boolean;
}

export interface NormalizedSeries {
	series: BarSeries;
	report: NormalizationReport;
}

export interface ResolveRequest {
	/** Identifier as the user typed it */
	input: string;
	timeframe: string;
}

export interface ResolvedSeries {
	status: "resolved";
	input: string;
	symbol: string;
	series: BarSeries;
	report: NormalizationReport;
}

export interface NotFound {
	status: "not_found";
	input: string;
	attempted: string[];
}

export interface TransientFailure {
	status: "transient_error";
	input: string;
	symbol: string;
	attempts: number;
	error: MarketDataError;
}

export interface MalformedInput {
	status: "malformed_input";
	input: string;
	symbol: string;
	error: MarketDataError;
}

export type ResolveResult =
	| ResolvedSeries
	| NotFound
	| TransientFailure
	| MalformedInput;

export type UnresolvedResult = Exclude<ResolveResult, ResolvedSeries>;

export interface SeriesSource {
	resolve(request: ResolveRequest): Promise<ResolveResult>;
}

export interface SeriesResolverConfig {
	client: MarketDataClient;
	/** Tried in order before the raw spelling, e.g. [".NS"] or ["/USDT"] */
	symbolSuffixes?: string[];
	intradayLookbackDays?: number;
	retry?: Partial<RetrySettings>;
	logger?: DataProviderLogger;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
}
