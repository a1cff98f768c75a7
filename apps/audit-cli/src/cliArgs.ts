import { parseTimeframe } from "@barlab/core";

export type ArgValue = string | boolean;

const BOOLEAN_FLAGS = new Set(["json", "help"]);

export const DEFAULT_TIMEFRAME = "1d";
export const DEFAULT_RSI_ROWS = 5;

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export interface ParsedArgs {
	flags: Record<string, ArgValue>;
	positionals: string[];
}

export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			flags[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (!BOOLEAN_FLAGS.has(key) && next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { flags, positionals };
};

const getStringArg = (
	flags: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = flags[key];
	if (value === true) {
		throw new UsageError(`--${key} needs a value`);
	}
	return typeof value === "string" && value.length ? value : undefined;
};

const isFlagSet = (flags: Record<string, ArgValue>, key: string): boolean =>
	flags[key] === true || flags[key] === "true";

export interface AuditOptions {
	symbol: string;
	timeframe: string;
	configDir?: string;
	profile?: string;
	rows: number;
	json: boolean;
	help: boolean;
}

export const USAGE = `Usage:
  barlab-audit <symbol> [options]

Options:
  --timeframe <tf>     Bar interval such as 15m, 1h or 1d (default ${DEFAULT_TIMEFRAME})
  --config <dir>       Config directory (default <workspace>/config)
  --profile <name>     Engine profile under config/engine (default "default")
  --rows <n>           Trailing RSI values to print (default ${DEFAULT_RSI_ROWS})
  --json               Print the summary as JSON
  --help               Show this message
`;

export const parseAuditOptions = (argv: string[]): AuditOptions => {
	const { flags, positionals } = parseCliArgs(argv);
	const help = isFlagSet(flags, "help");
	const symbol = positionals[0]?.trim() ?? "";
	if (!symbol && !help) {
		throw new UsageError("Missing required <symbol>");
	}

	const timeframe = (getStringArg(flags, "timeframe") ?? DEFAULT_TIMEFRAME)
		.trim()
		.toLowerCase();
	try {
		parseTimeframe(timeframe);
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}

	const rawRows = getStringArg(flags, "rows");
	const rows = rawRows === undefined ? DEFAULT_RSI_ROWS : Number(rawRows);
	if (!Number.isInteger(rows) || rows <= 0) {
		throw new UsageError(`--rows must be a positive integer, got ${rawRows}`);
	}

	return {
		symbol,
		timeframe,
		configDir: getStringArg(flags, "config"),
		profile: getStringArg(flags, "profile"),
		rows,
		json: isFlagSet(flags, "json"),
		help,
	};
};
