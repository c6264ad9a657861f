/**
 * Schema Introspector
 *
 * Reads tables, columns, primary keys and foreign keys from
 * information_schema + pg_catalog, and renders them as the text block the
 * generation prompts consume.
 */

import type { Pool, PoolClient } from "pg"
import { CollaboratorUnavailableError, errorMessage } from "./config.js"
import { silentLogger, type Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export type KeyRole = "primary" | "foreign"

export interface ColumnInfo {
	name: string
	dataType: string
	nullable: boolean
	keyRole: KeyRole | null
	defaultValue: string | null
	/** "table.column" for foreign keys */
	references: string | null
}

export interface TableSchema {
	name: string
	comment: string | null
	columns: ColumnInfo[]
}

export interface SchemaProvider {
	listTables(): Promise<string[]>
	describeTables(names: string[]): Promise<TableSchema[]>
}

interface ColumnRow {
	table_name: string
	column_name: string
	data_type: string
	is_nullable: boolean
	column_default: string | null
	is_pk: boolean
}

interface ForeignKeyRow {
	table_name: string
	column_name: string
	ref_table_name: string
	ref_column_name: string
}

interface TableRow {
	table_name: string
	comment: string | null
}

// ============================================================================
// Introspector Class
// ============================================================================

export class PostgresSchemaIntrospector implements SchemaProvider {
	private readonly pool: Pool
	private readonly schema: string
	private readonly logger: Logger

	constructor(pool: Pool, options: { schema?: string; logger?: Logger } = {}) {
		this.pool = pool
		this.schema = options.schema ?? "public"
		this.logger = options.logger ?? silentLogger
	}

	async listTables(): Promise<string[]> {
		return this.withClient(async (client) => {
			const rows = await this.getTables(client)
			return rows.map((row) => row.table_name)
		})
	}

	/**
	 * Full column metadata for the named tables, in the order given.
	 * Unknown names are skipped.
	 */
	async describeTables(names: string[]): Promise<TableSchema[]> {
		if (names.length === 0) return []
		const startTime = Date.now()

		return this.withClient(async (client) => {
			const tables = (await this.getTables(client)).filter((t) => names.includes(t.table_name))
			const tableNames = tables.map((t) => t.table_name)
			const columns = await this.getColumns(client, tableNames)
			const fks = await this.getForeignKeys(client, tableNames)

			const merged = this.mergeColumnsIntoTables(tables, columns, fks)
			merged.sort((a, b) => names.indexOf(a.name) - names.indexOf(b.name))

			this.logger.debug("Schema introspection complete", {
				tables: merged.length,
				columns: columns.length,
				fks: fks.length,
				latency_ms: Date.now() - startTime,
			})
			return merged
		})
	}

	private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
		let client: PoolClient
		try {
			client = await this.pool.connect()
		} catch (error) {
			throw new CollaboratorUnavailableError("database", `Cannot connect to database: ${errorMessage(error)}`)
		}

		try {
			return await fn(client)
		} finally {
			client.release()
		}
	}

	private async getTables(client: PoolClient): Promise<TableRow[]> {
		const query = `
			SELECT
				t.table_name,
				pg_catalog.obj_description(
					(quote_ident(t.table_schema) || '.' || quote_ident(t.table_name))::regclass,
					'pg_class'
				) AS comment
			FROM information_schema.tables t
			WHERE t.table_schema = $1
				AND t.table_type IN ('BASE TABLE', 'VIEW')
			ORDER BY t.table_name
		`

		const result = await client.query<TableRow>(query, [this.schema])
		return result.rows
	}

	private async getColumns(client: PoolClient, tableNames: string[]): Promise<ColumnRow[]> {
		const query = `
			WITH pk_columns AS (
				SELECT kcu.table_name, kcu.column_name
				FROM information_schema.table_constraints tc
				JOIN information_schema.key_column_usage kcu
					ON tc.constraint_name = kcu.constraint_name
					AND tc.table_schema = kcu.table_schema
				WHERE tc.constraint_type = 'PRIMARY KEY'
					AND tc.table_schema = $1
			)
			SELECT
				c.table_name,
				c.column_name,
				c.data_type,
				(c.is_nullable = 'YES') AS is_nullable,
				c.column_default,
				(pk.column_name IS NOT NULL) AS is_pk
			FROM information_schema.columns c
			LEFT JOIN pk_columns pk
				ON pk.table_name = c.table_name
				AND pk.column_name = c.column_name
			WHERE c.table_schema = $1
				AND c.table_name = ANY($2)
			ORDER BY c.table_name, c.ordinal_position
		`

		const result = await client.query<ColumnRow>(query, [this.schema, tableNames])
		return result.rows
	}

	private async getForeignKeys(client: PoolClient, tableNames: string[]): Promise<ForeignKeyRow[]> {
		const query = `
			SELECT
				kcu.table_name,
				kcu.column_name,
				ccu.table_name AS ref_table_name,
				ccu.column_name AS ref_column_name
			FROM information_schema.table_constraints tc
			JOIN information_schema.key_column_usage kcu
				ON tc.constraint_name = kcu.constraint_name
				AND tc.table_schema = kcu.table_schema
			JOIN information_schema.constraint_column_usage ccu
				ON ccu.constraint_name = tc.constraint_name
			WHERE tc.constraint_type = 'FOREIGN KEY'
				AND tc.table_schema = $1
				AND kcu.table_name = ANY($2)
			ORDER BY kcu.table_name, kcu.column_name
		`

		const result = await client.query<ForeignKeyRow>(query, [this.schema, tableNames])
		return result.rows
	}

	private mergeColumnsIntoTables(tables: TableRow[], columns: ColumnRow[], fks: ForeignKeyRow[]): TableSchema[] {
		// Index FKs by table.column
		const fkIndex = new Map<string, ForeignKeyRow>()
		for (const fk of fks) {
			fkIndex.set(`${fk.table_name}.${fk.column_name}`, fk)
		}

		const columnsByTable = new Map<string, ColumnRow[]>()
		for (const col of columns) {
			const existing = columnsByTable.get(col.table_name) || []
			existing.push(col)
			columnsByTable.set(col.table_name, existing)
		}

		return tables.map((table) => ({
			name: table.table_name,
			comment: table.comment,
			columns: (columnsByTable.get(table.table_name) || []).map((col) => {
				const fk = fkIndex.get(`${col.table_name}.${col.column_name}`)
				return {
					name: col.column_name,
					dataType: col.data_type,
					nullable: col.is_nullable,
					keyRole: col.is_pk ? "primary" : fk ? "foreign" : null,
					defaultValue: col.column_default,
					references: fk ? `${fk.ref_table_name}.${fk.ref_column_name}` : null,
				}
			}),
		}))
	}
}

// ============================================================================
// Rendering
// ============================================================================

function renderColumn(column: ColumnInfo): string {
	let line = `- ${column.name} ${column.dataType}`
	if (column.keyRole === "primary") line += " PRIMARY KEY"
	if (column.references) line += ` REFERENCES ${column.references}`
	if (!column.nullable) line += " NOT NULL"
	if (column.defaultValue !== null) line += ` DEFAULT ${column.defaultValue}`
	return line
}

/**
 * Text block of tables and columns for prompts.
 */
export function renderSchema(tables: TableSchema[]): string {
	return tables
		.map((table) => {
			const lines = [`### ${table.name}`]
			if (table.comment) lines.push(`-- ${table.comment}`)
			lines.push(...table.columns.map(renderColumn))
			return lines.join("\n")
		})
		.join("\n\n")
}
