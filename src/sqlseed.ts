/**
 * sqlseed - Fixture data for SQL databases
 *
 * Declare rows. Insert them. Run tests.
 */

// ============================================================================
// Insert Operations
// ============================================================================

export {Insert, InsertBuilder, RowBuilder, type Row} from "./impl/insert.js";

// ============================================================================
// Binders
// ============================================================================

export {
	Binders,
	DefaultBinderConfiguration,
	type Binder,
	type BinderConfiguration,
} from "./impl/binders.js";

// ============================================================================
// Value Generators
// ============================================================================

export {
	ValueGenerators,
	SequenceValueGenerator,
	StringSequenceValueGenerator,
	DateSequenceValueGenerator,
	type ValueGenerator,
	type DateUnit,
} from "./impl/generators.js";

// ============================================================================
// Connections
// ============================================================================

export type {
	Connection,
	PreparedStatement,
	ParameterMetadata,
	ParameterType,
	Operation,
} from "./impl/connection.js";

export {placeholder, renderInsert, type SQLDialect} from "./impl/sql.js";

export {connect, dialectFromURL} from "./connect.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	loadConfig,
	parseConfig,
	SeedConfigSchema,
	LogLevelSchema,
	type SeedConfig,
	type LogLevel,
} from "./impl/config.js";

export {setLogLevel, getLogLevel} from "./impl/logger.js";

// ============================================================================
// Errors
// ============================================================================

export {
	SeedError,
	BuilderStateError,
	BuilderArgumentError,
	BindError,
	ConfigError,
	ConstraintViolationError,
	isSeedError,
	hasErrorCode,
	type SeedErrorCode,
} from "./impl/errors.js";
