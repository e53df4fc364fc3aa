/**
 * Open a connection from configuration.
 *
 * The URL scheme selects the adapter:
 * - sqlite:, file: or :memory: → better-sqlite3
 * - postgres:// or postgresql:// → postgres.js
 * - mysql:// → mysql2
 *
 * Adapters are imported on demand, so only the driver actually used needs
 * to be installed.
 */

import type {Connection} from "./impl/connection.js";
import {loadConfig, type SeedConfig} from "./impl/config.js";
import {ConfigError} from "./impl/errors.js";
import {setLogLevel} from "./impl/logger.js";
import type {SQLDialect} from "./impl/sql.js";

/**
 * Determine the dialect of a database URL.
 *
 * @throws ConfigError for unsupported schemes
 */
export function dialectFromURL(url: string): SQLDialect {
	if (url === ":memory:" || url.startsWith("file:") || url.startsWith("sqlite:")) {
		return "sqlite";
	}
	if (url.startsWith("postgres://") || url.startsWith("postgresql://")) {
		return "postgresql";
	}
	if (url.startsWith("mysql://")) {
		return "mysql";
	}
	const scheme = url.includes(":") ? url.slice(0, url.indexOf(":")) : url;
	throw new ConfigError(`Unsupported database URL scheme: ${scheme}`, [
		`url: unsupported scheme "${scheme}"`,
	]);
}

/**
 * Open a connection for the configuration, or for the environment when no
 * configuration is given. The configured log level applies to every
 * sqlseed logger.
 */
export async function connect(
	config: SeedConfig = loadConfig(),
): Promise<Connection> {
	setLogLevel(config.logLevel);
	switch (dialectFromURL(config.url)) {
		case "sqlite": {
			const {default: SQLiteConnection} = await import("./sqlite.js");
			// sqlite: URLs name a file path; file: is handled by the adapter
			const path = config.url.startsWith("sqlite:")
				? config.url.slice("sqlite:".length)
				: config.url;
			return new SQLiteConnection(path);
		}
		case "postgresql": {
			const {default: PostgresConnection} = await import("./postgres.js");
			return new PostgresConnection(config.url, {
				max: config.poolMax,
				connectTimeout: config.connectTimeout,
			});
		}
		case "mysql": {
			const {default: MySQLConnection} = await import("./mysql.js");
			return new MySQLConnection(config.url, {
				connectionLimit: config.poolMax,
				connectTimeout: config.connectTimeout * 1000,
			});
		}
	}
}
