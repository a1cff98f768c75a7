import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";

export interface IndicatorSettings {
	rsiPeriod: number;
	emaSpan: number;
	smaPeriod: number;
	extremaWindow: number;
}

export interface MomentumThresholds {
	oversold: number;
	overbought: number;
}

export interface RetrySettings {
	attempts: number;
	baseDelayMs: number;
}

export interface FetchSettings {
	batchSize: number;
	maxIterations: number;
}

export interface EngineConfig {
	exchangeId: string;
	symbolSuffixes: string[];
	intradayLookbackDays: number;
	cacheTtlMs: number;
	retry: RetrySettings;
	fetch: FetchSettings;
	indicators: IndicatorSettings;
	momentum: MomentumThresholds;
}

export const DEFAULT_INDICATOR_SETTINGS: IndicatorSettings = {
	rsiPeriod: 14,
	emaSpan: 20,
	smaPeriod: 50,
	extremaWindow: 252,
};

export const DEFAULT_MOMENTUM_THRESHOLDS: MomentumThresholds = {
	oversold: 30,
	overbought: 70,
};

const INDICATOR_KEYS: (keyof IndicatorSettings)[] = [
	"rsiPeriod",
	"emaSpan",
	"smaPeriod",
	"extremaWindow",
];

const MOMENTUM_KEYS: (keyof MomentumThresholds)[] = ["oversold", "overbought"];

export type ConfigSourceType = "file";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	configMetadata.set(config, { ...configMetadata.get(config), ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

const WORKSPACE_SENTINELS = [".git", "config"];

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (
		!WORKSPACE_SENTINELS.some((entry) => fs.existsSync(path.join(current, entry)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown =>
	JSON.parse(fs.readFileSync(filePath, "utf-8"));

const ensureSection = (
	source: Record<string, unknown>,
	field: string
): Record<string, unknown> => {
	const value = source[field];
	if (!isRecord(value)) {
		throw new Error(`Required section missing in engine config: ${field}`);
	}
	return value;
};

const ensureNumber = (
	source: Record<string, unknown>,
	field: string,
	label = field
): number => {
	const value = source[field];
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric field missing in ${label}`);
	}
	return value;
};

const ensurePositiveInteger = (
	source: Record<string, unknown>,
	field: string,
	label = field
): number => {
	const value = ensureNumber(source, field, label);
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`${label} must be a positive integer, got ${value}`);
	}
	return value;
};

const ensureString = (source: Record<string, unknown>, field: string): string => {
	const value = source[field];
	if (typeof value !== "string" || value.trim() === "") {
		throw new Error(`Required string field missing in ${field}`);
	}
	return value.trim();
};

const ensureStringList = (
	source: Record<string, unknown>,
	field: string
): string[] => {
	const value = source[field];
	if (!Array.isArray(value)) {
		throw new Error(`Required list field missing in ${field}`);
	}
	return value.filter(
		(entry): entry is string => typeof entry === "string" && entry !== ""
	);
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseList = (value: string): string[] =>
	value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);

/**
 * Validates a parsed engine profile. Indicator and momentum sections are
 * optional and fall back to the defaults field by field.
 */
export const parseEngineConfig = (raw: unknown): EngineConfig => {
	if (!isRecord(raw)) {
		throw new Error("Engine config must be a JSON object");
	}
	const retry = ensureSection(raw, "retry");
	const fetchSection = ensureSection(raw, "fetch");
	const indicators = isRecord(raw.indicators) ? raw.indicators : {};
	const momentum = isRecord(raw.momentum) ? raw.momentum : {};

	const config: EngineConfig = {
		exchangeId: ensureString(raw, "exchangeId"),
		symbolSuffixes: ensureStringList(raw, "symbolSuffixes"),
		intradayLookbackDays: ensurePositiveInteger(raw, "intradayLookbackDays"),
		cacheTtlMs: ensureNumber(raw, "cacheTtlMs"),
		retry: {
			attempts: ensurePositiveInteger(retry, "attempts", "retry.attempts"),
			baseDelayMs: ensureNumber(retry, "baseDelayMs", "retry.baseDelayMs"),
		},
		fetch: {
			batchSize: ensurePositiveInteger(
				fetchSection,
				"batchSize",
				"fetch.batchSize"
			),
			maxIterations: ensurePositiveInteger(
				fetchSection,
				"maxIterations",
				"fetch.maxIterations"
			),
		},
		indicators: { ...DEFAULT_INDICATOR_SETTINGS },
		momentum: { ...DEFAULT_MOMENTUM_THRESHOLDS },
	};

	for (const key of INDICATOR_KEYS) {
		if (key in indicators) {
			config.indicators[key] = ensurePositiveInteger(
				indicators,
				key,
				`indicators.${key}`
			);
		}
	}
	for (const key of MOMENTUM_KEYS) {
		if (key in momentum) {
			config.momentum[key] = ensureNumber(
				momentum,
				key,
				`momentum.${key}`
			);
		}
	}
	if (config.momentum.oversold >= config.momentum.overbought) {
		throw new Error(
			`momentum.oversold (${config.momentum.oversold}) must be below momentum.overbought (${config.momentum.overbought})`
		);
	}

	return config;
};

const applyEnvOverrides = (config: EngineConfig): EngineConfig => {
	const exchangeId = readOptionalEnvVar("BARLAB_EXCHANGE_ID");
	const suffixes = readOptionalEnvVar("BARLAB_SYMBOL_SUFFIXES");
	const cacheTtl = readOptionalEnvVar("BARLAB_CACHE_TTL_MS");
	const cacheTtlMs = cacheTtl === undefined ? undefined : Number(cacheTtl);
	if (cacheTtlMs !== undefined && Number.isNaN(cacheTtlMs)) {
		throw new Error(`BARLAB_CACHE_TTL_MS must be numeric, got "${cacheTtl}"`);
	}
	return {
		...config,
		exchangeId: exchangeId ?? config.exchangeId,
		symbolSuffixes: suffixes === undefined ? config.symbolSuffixes : parseList(suffixes),
		cacheTtlMs: cacheTtlMs ?? config.cacheTtlMs,
	};
};

export interface EngineConfigLoadOptions {
	configDir?: string;
	profile?: string;
	envRoot?: string;
}

export const resolveEngineConfigPath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "engine", fileName),
		path.join(configDir, fileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new Error(
		`Engine config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadEngineConfig = (
	options: EngineConfigLoadOptions = {}
): EngineConfig => {
	loadEnvFiles(options.envRoot ?? findWorkspaceRoot());
	const configDir = options.configDir ?? getDefaultConfigDir();
	const profile = options.profile ?? readOptionalEnvVar("BARLAB_PROFILE") ?? "default";
	const configPath = resolveEngineConfigPath(configDir, profile);
	const config = applyEnvOverrides(parseEngineConfig(readJsonFile(configPath)));
	return withConfigMetadata(config, {
		source: "file",
		path: configPath,
		profile,
	});
};
