/**
 * MCP server: exposes the SQL agent and its knowledge base as tools.
 *
 * Tools:
 * - sql_agent               run one request through the workflow
 * - knowledge_base_search   retrieve similar examples
 * - knowledge_base_add      store a (question, SQL) example
 * - knowledge_base_status   size, dimension and backend of the store
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { COMPLEXITIES, CollaboratorUnavailableError, errorMessage } from "./config.js"
import type { AgentContext } from "./agent_context.js"
import type { SqlAgentConfig } from "./config/loadConfig.js"
import { estimateComplexity } from "./feedback_recorder.js"
import { runSqlAgent } from "./workflow_engine.js"

/**
 * Server start-up options (CLI argument, .mcp.json or environment)
 */
export const configSchema = z.object({
	postgresConnectionString: z.string().optional(),
	role: z.enum(["read", "write"]).optional(),
})

export type ServerOptions = z.infer<typeof configSchema>

/**
 * An explicit role decides whether statements run read-only; without one,
 * `execution.read_only` from config.yaml stands.
 */
export function applyRole(config: SqlAgentConfig, options: ServerOptions): SqlAgentConfig {
	if (!options.role) return config
	return { ...config, execution: { ...config.execution, read_only: options.role === "read" } }
}

type ToolResult = {
	content: Array<{ type: "text"; text: string }>
	isError?: boolean
}

function textResult(payload: unknown, isError: boolean = false): ToolResult {
	const text = typeof payload === "string" ? payload : JSON.stringify(payload, null, 2)
	return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] }
}

// ============================================================================
// Tool schemas
// ============================================================================

const sqlAgentShape = {
	question: z.string().min(1).describe("Natural-language request, SQL to explain, or SQL to fix"),
	max_retries: z.number().int().min(0).max(10).optional().describe("Repair attempts allowed after a failed execution"),
}

const searchShape = {
	query: z.string().min(1).describe("Question to find similar examples for"),
	tables: z.array(z.string()).optional().describe("Only return examples touching one of these tables"),
	k: z.number().int().positive().max(20).optional(),
	complexity: z.enum(COMPLEXITIES).optional().describe("Prefer examples of this complexity"),
}

const addShape = {
	natural_query: z.string().min(1),
	sql: z.string().min(1),
	tables: z.array(z.string()).default([]),
	complexity: z.enum(COMPLEXITIES).optional().describe("Estimated from the SQL when omitted"),
	tags: z.array(z.string()).default([]),
}

export type SqlAgentArgs = z.infer<z.ZodObject<typeof sqlAgentShape>>
export type SearchArgs = z.infer<z.ZodObject<typeof searchShape>>
export type AddArgs = z.infer<z.ZodObject<typeof addShape>>

// ============================================================================
// Handlers
// ============================================================================

export async function handleSqlAgent(args: SqlAgentArgs, context: AgentContext): Promise<ToolResult> {
	try {
		const result = await runSqlAgent({ question: args.question, maxRetries: args.max_retries }, context)
		return textResult(
			{
				message: result.message,
				intent: result.intent,
				sql: result.sql,
				final_state: result.finalState,
				retry_count: result.retryCount,
				tables_used: result.tablesUsed,
				error: result.error,
				request_id: result.requestId,
			},
			result.finalState === "FAILED",
		)
	} catch (error) {
		if (error instanceof CollaboratorUnavailableError) {
			context.logger.error("Request aborted, collaborator unavailable", {
				collaborator: error.collaborator,
				error: error.message,
			})
			return textResult(`Service unavailable (${error.collaborator}): ${error.message}`, true)
		}
		throw error
	}
}

export async function handleKnowledgeBaseSearch(args: SearchArgs, context: AgentContext): Promise<ToolResult> {
	const results = await context.store.retrieve({
		text: args.query,
		relevantTables: args.tables,
		k: args.k ?? context.config.knowledge_base.top_k,
		complexityHint: args.complexity,
	})
	return textResult(
		results.map(({ example, score }) => ({
			id: example.id,
			natural_query: example.naturalQuery,
			sql: example.sql,
			tables: example.tables,
			complexity: example.complexity,
			score: Number(score.toFixed(4)),
		})),
	)
}

export async function handleKnowledgeBaseAdd(args: AddArgs, context: AgentContext): Promise<ToolResult> {
	try {
		const ids = await context.store.add([
			{
				naturalQuery: args.natural_query,
				sql: args.sql,
				tables: args.tables,
				complexity: args.complexity ?? estimateComplexity(args.sql),
				tags: args.tags,
				source: "manual",
			},
		])
		if (ids.length === 0) return textResult({ added: false, reason: "an example with identical SQL already exists" })

		context.store.persist()
		return textResult({ added: true, id: ids[0], total: context.store.count })
	} catch (error) {
		return textResult(`Failed to add example: ${errorMessage(error)}`, true)
	}
}

export function handleKnowledgeBaseStatus(context: AgentContext): ToolResult {
	return textResult({
		count: context.store.count,
		dimension: context.store.dimension,
		backend: context.store.backend,
		embedding_model: context.store.modelName,
		dir: context.config.knowledge_base.dir,
	})
}

// ============================================================================
// Server
// ============================================================================

export default function createServer({ context }: { context: AgentContext }): McpServer {
	const server = new McpServer({
		name: "sql-agent",
		version: "1.0.0",
	})

	server.tool(
		"sql_agent",
		"Answer a database question: generates SQL from natural language and runs it, explains SQL, or fixes failing SQL. Successful queries are remembered as examples.",
		sqlAgentShape,
		(args) => handleSqlAgent(args, context),
	)

	server.tool(
		"knowledge_base_search",
		"Find stored (question, SQL) examples similar to a question",
		searchShape,
		(args) => handleKnowledgeBaseSearch(args, context),
	)

	server.tool(
		"knowledge_base_add",
		"Store a (question, SQL) example for future retrieval",
		addShape,
		(args) => handleKnowledgeBaseAdd(args, context),
	)

	server.tool("knowledge_base_status", "Size and configuration of the example store", async () =>
		handleKnowledgeBaseStatus(context),
	)

	context.logger.debug("MCP tools registered", { tools: 4 })
	return server
}
