import {
	createLogger,
	loadEngineConfig,
	type EngineConfig,
	type MarketDataClient,
} from "@barlab/core";
import { analyzeSymbol } from "@barlab/analysis";
import {
	SeriesResolver,
	createCachedResolver,
	type DataProviderLogger,
} from "@barlab/data";
import { CcxtMarketDataClient } from "@barlab/exchange-ccxt";
import { USAGE, UsageError, parseAuditOptions, type AuditOptions } from "./cliArgs";
import {
	EXIT_CODES,
	exitCodeFor,
	renderFailure,
	renderJson,
	renderReport,
} from "./render";

export interface AuditRuntime {
	createClient?: (config: EngineConfig, logger: DataProviderLogger) => MarketDataClient;
	logger?: DataProviderLogger;
	sleep?: (ms: number) => Promise<void>;
	stdout?: (line: string) => void;
	stderr?: (line: string) => void;
}

const defaultClient = (
	config: EngineConfig,
	logger: DataProviderLogger
): MarketDataClient =>
	new CcxtMarketDataClient({
		exchangeId: config.exchangeId,
		batchSize: config.fetch.batchSize,
		maxIterations: config.fetch.maxIterations,
		logger,
	});

/**
 * Runs one audit and returns the process exit code.
 */
export const runAudit = async (
	argv: string[],
	runtime: AuditRuntime = {}
): Promise<number> => {
	const stdout = runtime.stdout ?? ((text: string) => console.log(text));
	const stderr = runtime.stderr ?? ((text: string) => console.error(text));
	const logger = runtime.logger ?? createLogger("audit-cli");

	let options: AuditOptions;
	try {
		options = parseAuditOptions(argv);
	} catch (error) {
		if (!(error instanceof UsageError)) {
			throw error;
		}
		stderr(error.message);
		stderr(USAGE);
		return EXIT_CODES.usage;
	}
	if (options.help) {
		stdout(USAGE);
		return EXIT_CODES.ok;
	}

	const config = loadEngineConfig({
		configDir: options.configDir,
		profile: options.profile,
	});
	logger.info?.("cli_starting", {
		symbol: options.symbol,
		timeframe: options.timeframe,
		exchange: config.exchangeId,
		suffixes: config.symbolSuffixes,
	});

	const client = (runtime.createClient ?? defaultClient)(config, logger);
	const resolver = new SeriesResolver({
		client,
		symbolSuffixes: config.symbolSuffixes,
		intradayLookbackDays: config.intradayLookbackDays,
		retry: config.retry,
		logger,
		sleep: runtime.sleep,
	});
	const source = createCachedResolver(resolver, { ttlMs: config.cacheTtlMs });

	const result = await analyzeSymbol(
		{ input: options.symbol, timeframe: options.timeframe },
		{
			source,
			indicators: config.indicators,
			momentum: config.momentum,
			logger,
		}
	);

	if (result.status !== "ok") {
		stderr(renderFailure(result));
		return exitCodeFor(result);
	}
	if (options.json) {
		stdout(renderJson(result, options.rows));
	} else {
		renderReport(result, options.rows).forEach((text) => stdout(text));
	}
	return exitCodeFor(result);
};
