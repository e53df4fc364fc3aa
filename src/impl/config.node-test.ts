import {describe, test, expect, thrown} from "./node-test-utils.js";
import {loadConfig, parseConfig} from "./config.js";
import {ConfigError} from "./errors.js";
import {connect, dialectFromURL} from "../connect.js";
import {createLogger, getLogLevel, setLogLevel} from "./logger.js";

describe("loadConfig()", () => {
	test("applies defaults", () => {
		expect(loadConfig({SQLSEED_DATABASE_URL: ":memory:"})).toEqual({
			url: ":memory:",
			logLevel: "warn",
			poolMax: 10,
			connectTimeout: 30,
		});
	});

	test("reads every variable, ignoring empty ones", () => {
		const config = loadConfig({
			SQLSEED_DATABASE_URL: "postgresql://localhost/fixtures",
			SQLSEED_LOG_LEVEL: "debug",
			SQLSEED_POOL_MAX: "4",
			SQLSEED_CONNECT_TIMEOUT: "",
		});
		expect(config).toEqual({
			url: "postgresql://localhost/fixtures",
			logLevel: "debug",
			poolMax: 4,
			connectTimeout: 30,
		});
	});

	test("lists every issue", () => {
		const error = thrown(() =>
			loadConfig({SQLSEED_LOG_LEVEL: "loud", SQLSEED_POOL_MAX: "0"}),
		);
		expect(error).toBeInstanceOf(ConfigError);
		if (error instanceof ConfigError) {
			expect(error.code).toBe("CONFIG_ERROR");
			expect(error.issues.map((issue) => issue.split(":")[0])).toEqual([
				"url",
				"logLevel",
				"poolMax",
			]);
		}
	});
});

describe("parseConfig()", () => {
	test("accepts numbers as well as strings", () => {
		const config = parseConfig({url: "mysql://localhost/db", poolMax: 2});
		expect(config.poolMax).toBe(2);
	});
});

describe("dialectFromURL()", () => {
	test("recognizes supported schemes", () => {
		expect(dialectFromURL(":memory:")).toBe("sqlite");
		expect(dialectFromURL("file:fixtures.db")).toBe("sqlite");
		expect(dialectFromURL("sqlite:fixtures.db")).toBe("sqlite");
		expect(dialectFromURL("postgres://localhost/db")).toBe("postgresql");
		expect(dialectFromURL("postgresql://localhost/db")).toBe("postgresql");
		expect(dialectFromURL("mysql://localhost/db")).toBe("mysql");
	});

	test("rejects other schemes", () => {
		expect(() => dialectFromURL("mssql://localhost/db")).toThrow(
			"Unsupported database URL scheme: mssql",
		);
	});
});

describe("connect()", () => {
	test("applies the configured log level to every logger", async () => {
		const previous = getLogLevel();
		const existing = createLogger("config-test");
		try {
			const connection = await connect(
				parseConfig({url: ":memory:", logLevel: "error"}),
			);
			expect(connection.dialect).toBe("sqlite");
			expect(getLogLevel()).toBe("error");
			expect(existing.level).toBe("error");
			expect(createLogger("config-test-later").level).toBe("error");
			await connection.close();
		} finally {
			setLogLevel(previous);
		}
		expect(existing.level).toBe(previous);
	});
});
