/**
 * Shared types, constants and errors for the SQL agent
 *
 * Includes:
 * - Knowledge-base record shapes (examples, retrieval query/result)
 * - Structured error classes
 * - SQLSTATE classification for execution failures
 */

import { z } from "zod"

// ============================================================================
// Examples
// ============================================================================

export const COMPLEXITIES = ["simple", "medium", "complex"] as const
export type Complexity = (typeof COMPLEXITIES)[number]

export const COMPLEXITY_RANK: Record<Complexity, number> = {
	simple: 0,
	medium: 1,
	complex: 2,
}

/**
 * A stored (question, SQL) pair. Immutable once stored.
 */
export interface Example {
	id: string
	naturalQuery: string
	sql: string
	tables: string[]
	complexity: Complexity
	tags: string[]
	/** Where the example came from: "seed", "feedback_loop", "manual" */
	source?: string
	createdAt?: string
}

/** Example before it has been assigned an id. */
export type ExampleInput = Omit<Example, "id">

/**
 * On-disk / JSON shape of an example (snake_case, matches seed files)
 */
export const exampleFileSchema = z.object({
	natural_query: z.string().min(1),
	sql: z.string().min(1),
	tables: z.array(z.string()).default([]),
	complexity: z.enum(COMPLEXITIES).default("medium"),
	tags: z.array(z.string()).default([]),
	source: z.string().optional(),
})

export type ExampleFileEntry = z.infer<typeof exampleFileSchema>

export function exampleFromFile(entry: ExampleFileEntry): ExampleInput {
	return {
		naturalQuery: entry.natural_query,
		sql: entry.sql,
		tables: entry.tables,
		complexity: entry.complexity,
		tags: entry.tags,
		source: entry.source,
	}
}

export interface RetrievalQuery {
	text: string
	relevantTables?: string[]
	/** Positive integer */
	k: number
	complexityHint?: Complexity
}

export interface ScoredExample {
	example: Example
	/** Adjusted score when a complexity hint was given, cosine similarity otherwise */
	score: number
}

export type RetrievalResult = ScoredExample[]

// ============================================================================
// Errors
// ============================================================================

export type SqlAgentErrorType =
	| "embedding"
	| "index"
	| "persistence"
	| "classification"
	| "generation"
	| "execution"
	| "timeout"
	| "unavailable"

/**
 * Error types for structured error handling
 */
export class SqlAgentError extends Error {
	constructor(
		public type: SqlAgentErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "SqlAgentError"
	}
}

/** Embedding provider unreachable or returned unusable vectors. */
export class EmbeddingError extends SqlAgentError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("embedding", message, true, context)
		this.name = "EmbeddingError"
	}
}

export type VectorIndexErrorKind = "duplicate_id" | "dimension_mismatch" | "length_mismatch"

/** Fatal to the single ingestion call that raised it. */
export class VectorIndexError extends SqlAgentError {
	constructor(
		public kind: VectorIndexErrorKind,
		message: string,
		context?: Record<string, unknown>,
	) {
		super("index", message, false, context)
		this.name = "VectorIndexError"
	}
}

export class PersistenceError extends SqlAgentError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("persistence", message, false, context)
		this.name = "PersistenceError"
	}
}

export class ClassificationError extends SqlAgentError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("classification", message, true, context)
		this.name = "ClassificationError"
	}
}

/**
 * A collaborator (LLM service, database) cannot be reached at all.
 * The only error allowed to abort a whole request.
 */
export class CollaboratorUnavailableError extends SqlAgentError {
	constructor(
		public collaborator: string,
		message: string,
		context?: Record<string, unknown>,
	) {
		super("unavailable", message, false, context)
		this.name = "CollaboratorUnavailableError"
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Execution outcomes
// ============================================================================

export type ExecutionErrorKind = "timeout" | "database_error" | "other"

export interface QuerySuccess {
	success: true
	rows: Record<string, unknown>[]
	rowCount: number
	columns: string[]
	truncated: boolean
}

export interface StatementSuccess {
	success: true
	affectedCount: number
}

export interface ExecutionFailure {
	success: false
	errorKind: ExecutionErrorKind
	message: string
	sqlstate?: string
}

export type ExecutionOutcome = QuerySuccess | StatementSuccess | ExecutionFailure

/**
 * Postgres error fields worth carrying into repair context
 */
export interface PostgresErrorContext {
	sqlstate: string
	message: string
	hint?: string
	detail?: string
	position?: number
}

/**
 * Parse PostgreSQL error into structured format
 */
export function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error && typeof error === "object") {
		const source: object = error
		const text = (field: string): string | undefined => {
			const value: unknown = Reflect.get(source, field)
			return typeof value === "string" ? value : undefined
		}

		const rawPosition: unknown = Reflect.get(source, "position")
		const position = typeof rawPosition === "string" ? parseInt(rawPosition, 10) : rawPosition
		return {
			sqlstate: text("code") ?? "UNKNOWN",
			message: text("message") ?? String(error),
			hint: text("hint"),
			detail: text("detail"),
			position: typeof position === "number" && !isNaN(position) ? position : undefined,
		}
	}

	return {
		sqlstate: "UNKNOWN",
		message: String(error),
	}
}

/**
 * SQLSTATE 57014 is query_canceled, which is what statement_timeout raises.
 */
function isTimeoutError(sqlstate: string): boolean {
	return sqlstate === "57014"
}

/**
 * Classify a parsed Postgres error into an execution error kind
 */
export function classifyExecutionError(ctx: PostgresErrorContext): ExecutionErrorKind {
	if (isTimeoutError(ctx.sqlstate)) return "timeout"
	if (/^[0-9A-Z]{5}$/.test(ctx.sqlstate)) return "database_error"
	return "other"
}

/**
 * Get hint for SQLSTATE error
 */
export function getSQLSTATEHint(sqlstate: string): string {
	const hints: Record<string, string> = {
		"42601": "Fix SQL syntax based on the error position",
		"42P01": "Use correct table name from the schema",
		"42703": "Use correct column name - check schema",
		"42702": "Qualify ambiguous column with table alias",
		"42804": "Fix datatype mismatch in comparison",
		"42883": "Use correct function name or check argument types",
		"42803": "Add missing column to GROUP BY or use aggregate",
		"22012": "Avoid division by zero - add NULLIF or CASE",
		"57014": "Query timed out - simplify query or add filters",
	}
	return hints[sqlstate] || "Review the error message and fix the SQL"
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
	maxRetries: 3,
	overFetchMultiplier: 3,
	complexityPenalty: 0.1,
	executionTimeoutMs: 30000,
	maxRows: 100,
	topK: 3,
}
