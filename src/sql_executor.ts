/**
 * SQL Sandbox
 *
 * Runs one statement on a pooled Postgres connection with:
 * - server-side `statement_timeout`
 * - a client-side timer / AbortSignal that drops the connection
 * - optional read-only transaction
 *
 * Statement failures come back as ExecutionFailure values; only an
 * unreachable database throws (CollaboratorUnavailableError).
 */

import pg from "pg"
import type { Pool } from "pg"
import {
	CollaboratorUnavailableError,
	classifyExecutionError,
	errorMessage,
	parsePostgresError,
	type ExecutionOutcome,
} from "./config.js"
import type { SqlAgentConfig } from "./config/loadConfig.js"
import { silentLogger, type Logger } from "./logger.js"

export interface ExecuteOptions {
	timeoutMs: number
	maxRows?: number
	signal?: AbortSignal
}

export interface SqlSandbox {
	execute(sql: string, options: ExecuteOptions): Promise<ExecutionOutcome>
}

export interface PostgresSandboxOptions {
	readOnly?: boolean
	maxRows?: number
	logger?: Logger
}

type Row = Record<string, unknown>

/** The part of a pg query result the sandbox reads */
export interface StatementResult {
	rows: Row[]
	fields: Array<{ name: string }>
	rowCount: number | null
}

/** Narrow view of a pg PoolClient */
export interface SandboxClient {
	query(text: string): Promise<StatementResult>
	release(destroy?: boolean): void
}

/** Narrow view of a pg Pool */
export interface ConnectionSource {
	connect(): Promise<SandboxClient>
}

// Extra time given to statement_timeout before the client gives up on the connection
const CLIENT_GRACE_MS = 1000

export class PostgresSandbox implements SqlSandbox {
	private readonly pool: ConnectionSource
	private readonly readOnly: boolean
	private readonly maxRows: number
	private readonly logger: Logger

	constructor(pool: ConnectionSource, options: PostgresSandboxOptions = {}) {
		this.pool = pool
		this.readOnly = options.readOnly ?? true
		this.maxRows = options.maxRows ?? 100
		this.logger = options.logger ?? silentLogger
	}

	async execute(sql: string, options: ExecuteOptions): Promise<ExecutionOutcome> {
		const maxRows = options.maxRows ?? this.maxRows
		const timeoutMs = Math.max(1, Math.floor(options.timeoutMs))

		let client: SandboxClient
		try {
			client = await this.pool.connect()
		} catch (error) {
			throw new CollaboratorUnavailableError("database", `Cannot connect to database: ${errorMessage(error)}`)
		}

		let destroyed = false
		const cancel = new AbortController()
		const onAbort = () => cancel.abort()
		options.signal?.addEventListener("abort", onAbort)
		const timer = setTimeout(onAbort, timeoutMs + CLIENT_GRACE_MS)

		const cancelled = new Promise<"cancelled">((resolve) => {
			if (options.signal?.aborted) resolve("cancelled")
			cancel.signal.addEventListener("abort", () => resolve("cancelled"))
		})

		try {
			await client.query(this.readOnly ? "BEGIN READ ONLY" : "BEGIN")
			await client.query(`SET LOCAL statement_timeout = ${timeoutMs}`)

			const running = client.query(sql)
			const settled = await Promise.race([running, cancelled])

			if (settled === "cancelled") {
				running.catch((error: unknown) => {
					this.logger.debug("Cancelled statement settled", { error: errorMessage(error) })
				})
				// Dropping the connection ends the backend's statement
				destroyed = true
				client.release(true)
				this.logger.warn("Statement cancelled on client side", { timeout_ms: timeoutMs })
				return {
					success: false,
					errorKind: "timeout",
					message: options.signal?.aborted
						? "Query was cancelled"
						: `Query exceeded the ${timeoutMs}ms execution timeout`,
				}
			}

			await client.query("COMMIT")
			return toOutcome(settled, maxRows)
		} catch (error) {
			const pgError = parsePostgresError(error)
			if (!destroyed) {
				await client.query("ROLLBACK").catch((rollbackError: unknown) => {
					this.logger.warn("Rollback failed", { error: errorMessage(rollbackError) })
				})
			}
			this.logger.info("Statement failed", { sqlstate: pgError.sqlstate, message: pgError.message })
			return {
				success: false,
				errorKind: classifyExecutionError(pgError),
				message: pgError.message,
				sqlstate: pgError.sqlstate,
			}
		} finally {
			clearTimeout(timer)
			options.signal?.removeEventListener("abort", onAbort)
			if (!destroyed) client.release()
		}
	}
}

function toOutcome(result: StatementResult, maxRows: number): ExecutionOutcome {
	if (result.fields.length === 0) {
		return { success: true, affectedCount: result.rowCount ?? 0 }
	}
	return {
		success: true,
		rows: result.rows.slice(0, maxRows),
		rowCount: result.rows.length,
		columns: result.fields.map((field) => field.name),
		truncated: result.rows.length > maxRows,
	}
}

export function createPool(config: SqlAgentConfig, connectionString?: string): Pool {
	if (connectionString) return new pg.Pool({ connectionString, max: 5 })
	const { database } = config
	return new pg.Pool({
		host: database.host,
		port: database.port,
		database: database.name,
		user: database.user,
		password: database.password,
		max: 5,
	})
}

// ============================================================================
// Result rendering
// ============================================================================

const MAX_CELL_LENGTH = 50

function formatCell(value: unknown): string {
	let text: string
	if (value === null || value === undefined) text = "NULL"
	else if (value instanceof Date) text = value.toISOString()
	else if (typeof value === "object") text = JSON.stringify(value)
	else text = String(value)

	if (text.length > MAX_CELL_LENGTH) text = `${text.slice(0, MAX_CELL_LENGTH - 3)}...`
	return text.replace(/\|/g, "\\|").replace(/\n/g, " ")
}

/**
 * Markdown table of the first `maxRows` rows.
 */
export function formatResultTable(columns: string[], rows: Row[], maxRows: number = 10): string {
	if (rows.length === 0) return "(no rows)"

	const lines = [`| ${columns.join(" | ")} |`, `| ${columns.map(() => "---").join(" | ")} |`]
	for (const row of rows.slice(0, maxRows)) {
		lines.push(`| ${columns.map((column) => formatCell(row[column])).join(" | ")} |`)
	}
	if (rows.length > maxRows) {
		lines.push("", `... ${rows.length - maxRows} more rows`)
	}
	return lines.join("\n")
}
