/**
 * SQL rendering utilities for all dialects.
 *
 * This is the single source of truth for dialect-specific SQL rendering:
 * - Placeholder syntax
 * - INSERT statement rendering
 */

// ============================================================================
// Types
// ============================================================================

export type SQLDialect = "sqlite" | "postgresql" | "mysql";

// ============================================================================
// Core Helpers
// ============================================================================

/**
 * Get placeholder syntax based on dialect.
 * PostgreSQL uses $1, $2, etc. MySQL/SQLite use ?.
 */
export function placeholder(index: number, dialect: SQLDialect): string {
	if (dialect === "postgresql") {
		return `$${index}`;
	}
	return "?";
}

// ============================================================================
// Statement Rendering
// ============================================================================

/**
 * Render a parameterized INSERT statement with one placeholder per column.
 *
 * Table and column names are written as given, so callers can pass
 * schema-qualified or already-quoted names.
 *
 * @example
 * renderInsert("users", ["id", "name"], "postgresql");
 * // INSERT INTO users (id, name) VALUES ($1, $2)
 */
export function renderInsert(
	table: string,
	columns: readonly string[],
	dialect: SQLDialect,
): string {
	const placeholders = columns.map((_, i) => placeholder(i + 1, dialect));
	return `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${placeholders.join(", ")})`;
}
