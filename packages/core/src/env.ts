import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Loads `.env` style files from the project root once each. Later files
 * override earlier ones.
 */
export function loadEnvFiles(projectRoot: string): string[] {
	const candidates = unique(
		[".env", ".env.local", process.env.BARLAB_ENV_FILE].filter(
			(value): value is string => typeof value === "string" && value !== ""
		)
	);

	const applied: string[] = [];
	for (const candidate of candidates) {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			continue;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	}
	return applied;
}

const unique = (values: string[]): string[] =>
	values.filter((value, index) => values.indexOf(value) === index);
