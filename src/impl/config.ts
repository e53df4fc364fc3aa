/**
 * Configuration schema and environment loading.
 *
 * Zod schemas validate configuration and infer its types.
 */

import {z} from "zod";
import {ConfigError} from "./errors.js";

// ============================================================================
// Log Level
// ============================================================================

export const LogLevelSchema = z.enum([
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

// ============================================================================
// Seed Configuration
// ============================================================================

export const SeedConfigSchema = z.object({
	/** Database URL; the scheme selects the adapter */
	url: z.string().min(1),
	/** pino log level */
	logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
	/** Maximum pooled connections (PostgreSQL, MySQL) */
	poolMax: z.coerce.number().int().min(1).max(100).default(10),
	/** Connection timeout in seconds (PostgreSQL, MySQL) */
	connectTimeout: z.coerce.number().int().min(1).max(600).default(30),
});

export type SeedConfig = z.infer<typeof SeedConfigSchema>;

/**
 * Environment variables read by loadConfig().
 */
export const ENV_KEYS = {
	url: "SQLSEED_DATABASE_URL",
	logLevel: "SQLSEED_LOG_LEVEL",
	poolMax: "SQLSEED_POOL_MAX",
	connectTimeout: "SQLSEED_CONNECT_TIMEOUT",
} as const;

/**
 * Validate a configuration object.
 *
 * @throws ConfigError listing every issue as "path: message"
 */
export function parseConfig(input: unknown): SeedConfig {
	const result = SeedConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.map(String).join(".")}: ${issue.message}`,
		);
		throw new ConfigError(
			`Invalid configuration: ${issues.join("; ")}`,
			issues,
			{cause: result.error},
		);
	}
	return result.data;
}

/**
 * Load configuration from environment variables.
 * Unset and empty variables fall back to their defaults.
 */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): SeedConfig {
	const input: Record<string, string> = {};
	for (const [field, key] of Object.entries(ENV_KEYS)) {
		const value = env[key];
		if (value !== undefined && value !== "") {
			input[field] = value;
		}
	}
	return parseConfig(input);
}
