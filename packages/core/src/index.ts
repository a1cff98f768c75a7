/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the monorepo should depend on these primitives.
 */
export * from "./types";
export * from "./exchange";
export * from "./config";
export { loadEnvFiles } from "./env";
export {
	createLogger,
	log,
	normalizeLevel,
	sanitizeValue,
} from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";
