/**
 * Workflow Engine
 *
 *   INTENT ──chat──▶ CHAT ──▶ DONE
 *     │
 *     └─sql──▶ SCHEMA ──▶ GENERATE ──▶ EXECUTE ──ok──▶ DONE
 *                            ▲            │
 *                            └──repair────┤ retryCount < maxRetries
 *                                         └──────────▶ FAILED
 *
 * The GENERATE/EXECUTE cycle is bounded by `retryCount`, which is checked
 * before every retry decision and grows by exactly one per repair pass.
 *
 * Stage errors are recorded on the state and drive transitions. The only
 * error that escapes `run()` is an unreachable collaborator.
 */

import { v4 as uuidv4 } from "uuid"
import {
	CollaboratorUnavailableError,
	SqlAgentError,
	errorMessage,
	getSQLSTATEHint,
	type ExecutionOutcome,
} from "./config.js"
import type { Intent } from "./config/loadConfig.js"
import type { AgentContext } from "./agent_context.js"
import { classifyIntent } from "./intent_classifier.js"
import type { ChatMessage } from "./llm_client.js"
import {
	CHAT_SYSTEM_PROMPT,
	buildRepairPrompt,
	buildSqlToTextPrompt,
	buildTableSelectorPrompt,
	buildTextToSqlPrompt,
	userTurn,
} from "./prompts.js"
import { renderSchema } from "./schema_introspector.js"
import { formatResultTable } from "./sql_executor.js"
import {
	createInitialState,
	type RepairContext,
	type WorkflowStage,
	type WorkflowState,
} from "./workflow_state.js"

// ============================================================================
// Text helpers
// ============================================================================

/**
 * Strip markdown code fences from an LLM answer.
 */
export function cleanSql(raw: string): string {
	const text = raw.trim()
	const fenced = /```(?:sql)?[^\n]*\n([\s\S]*?)```/i.exec(text)
	if (fenced) return fenced[1].trim()
	return text.replace(/^```(?:sql)?/i, "").replace(/```$/, "").trim()
}

/**
 * First SELECT/WITH statement in the text, up to a blank line.
 * Returns the whole text when no statement is found.
 */
export function extractSql(text: string): string {
	const cleaned = text.replace(/```(?:sql)?/gi, "")
	const start = cleaned.search(/\b(select|with)\b/i)
	if (start === -1) return text.trim()
	const rest = cleaned.slice(start)
	const end = rest.search(/\n\s*\n/)
	return (end === -1 ? rest : rest.slice(0, end)).trim()
}

/**
 * Table names from a comma/newline separated LLM answer, restricted to
 * `known` (case-insensitive) and de-duplicated.
 */
export function parseTableSelection(raw: string, known: string[]): string[] {
	const byLower = new Map(known.map((name) => [name.toLowerCase(), name]))
	const selected: string[] = []
	for (const token of raw.split(/[,\n]/)) {
		const name = byLower.get(token.replace(/[`"'*\-\s]/g, "").toLowerCase())
		if (name && !selected.includes(name)) selected.push(name)
	}
	return selected
}

// ============================================================================
// Engine
// ============================================================================

export class WorkflowEngine {
	constructor(private readonly context: AgentContext) {}

	async run(state: WorkflowState): Promise<WorkflowState> {
		const { logger } = this.context
		let stage = state.stage

		while (stage !== "DONE" && stage !== "FAILED") {
			state.stage = stage
			state.trace.push(stage)
			const next = await this.step(stage, state)
			logger.debug("Stage transition", { from: stage, to: next, retry_count: state.retryCount })
			stage = next
		}

		state.stage = stage
		state.trace.push(stage)
		return state
	}

	private step(stage: WorkflowStage, state: WorkflowState): Promise<WorkflowStage> {
		switch (stage) {
			case "INTENT":
				return this.classify(state)
			case "CHAT":
				return this.chat(state)
			case "SCHEMA":
				return this.loadSchema(state)
			case "GENERATE":
				return this.generate(state)
			case "EXECUTE":
				return this.execute(state)
			case "DONE":
			case "FAILED":
				return Promise.resolve(stage)
		}
	}

	private async classify(state: WorkflowState): Promise<WorkflowStage> {
		const { llm, config, logger } = this.context
		state.currentAgent = "intent_classifier"

		if (!state.userQuery.trim()) {
			state.error = "No user input found"
			return "FAILED"
		}

		const result = await classifyIntent(state.userQuery, llm, {
			defaultIntent: config.workflow.default_intent,
			fastPathConfidence: config.workflow.fast_path_confidence,
			logger,
		})
		state.intent = result.intent
		state.intentConfidence = result.confidence

		logger.info("Intent classified", { intent: result.intent, confidence: result.confidence, source: result.source })
		return result.intent === "chat" ? "CHAT" : "SCHEMA"
	}

	private async chat(state: WorkflowState): Promise<WorkflowStage> {
		state.currentAgent = "chat_handler"
		try {
			const reply = await this.context.llm.complete([{ role: "system", content: CHAT_SYSTEM_PROMPT }, ...state.messages])
			state.messages.push({ role: "assistant", content: reply.trim() })
		} catch (error) {
			if (error instanceof CollaboratorUnavailableError) throw error
			state.error = `Chat reply failed: ${errorMessage(error)}`
			this.context.logger.warn("Chat reply failed", { error: errorMessage(error) })
		}
		return "DONE"
	}

	/**
	 * Attach schema context. Failure is soft: generation continues without it.
	 */
	private async loadSchema(state: WorkflowState): Promise<WorkflowStage> {
		const { schema, config, logger } = this.context
		const { schema_table_limit, max_relevant_tables } = config.workflow
		state.currentAgent = "schema_retriever"

		try {
			const allTables = await schema.listTables()
			let relevant: string[] = []

			if (allTables.length > 0) {
				const brief = renderSchema(await schema.describeTables(allTables.slice(0, schema_table_limit)))
				const answer = await this.context.llm.complete(userTurn(buildTableSelectorPrompt(brief, state.userQuery)), {
					temperature: 0,
				})
				relevant = parseTableSelection(answer, allTables)
			}
			if (relevant.length === 0) relevant = allTables.slice(0, max_relevant_tables)

			const tables = await schema.describeTables(relevant)
			state.relevantTables = relevant
			state.schemaInfo = { tables, formatted: renderSchema(tables) }
			state.messages.push({ role: "assistant", content: `[Schema] Relevant tables: ${relevant.join(", ")}` })
			logger.info("Schema attached", { tables: relevant })
		} catch (error) {
			if (error instanceof CollaboratorUnavailableError && error.collaborator === "llm") throw error
			state.schemaInfo = null
			state.relevantTables = []
			state.error = `Schema retrieval failed: ${errorMessage(error)}`
			logger.warn("Schema retrieval failed, continuing without schema", { error: errorMessage(error) })
		}

		return "GENERATE"
	}

	/**
	 * Retrieval mode builds a few-shot prompt from the example store; repair
	 * mode works from the prior SQL and its error and skips retrieval.
	 */
	private async generate(state: WorkflowState): Promise<WorkflowStage> {
		const { llm, store, config, logger } = this.context
		const schemaText = state.schemaInfo?.formatted ?? ""
		state.currentAgent = "sql_generator"

		try {
			if (state.intent === "sql_to_text") {
				const sql = extractSql(state.userQuery)
				const explanation = await llm.complete(userTurn(buildSqlToTextPrompt(schemaText, sql)))
				state.generatedSQL = sql
				state.sqlExplanation = explanation.trim()
				return "EXECUTE"
			}

			const repair: RepairContext | null =
				state.repairContext ??
				(state.intent === "debug" ? { sql: extractSql(state.userQuery), error: state.userQuery } : null)

			let answer: string
			if (repair) {
				logger.debug("Generating in repair mode", { retry_count: state.retryCount, sqlstate: repair.sqlstate })
				answer = await llm.complete(
					userTurn(
						buildRepairPrompt({
							schema: schemaText,
							sql: repair.sql,
							error: repair.error,
							hint: repair.sqlstate ? getSQLSTATEHint(repair.sqlstate) : undefined,
						}),
					),
				)
			} else {
				const examples = await store.retrieve({
					text: state.userQuery,
					relevantTables: state.relevantTables,
					k: config.knowledge_base.top_k,
				})
				logger.debug("Retrieval-augmented generation", { examples: examples.length })
				answer = await llm.complete(
					userTurn(buildTextToSqlPrompt(schemaText, store.format(examples), state.userQuery)),
				)
			}

			const sql = cleanSql(answer)
			if (!sql) throw new SqlAgentError("generation", "LLM returned an empty answer", true)
			state.generatedSQL = sql
			return "EXECUTE"
		} catch (error) {
			if (error instanceof CollaboratorUnavailableError) throw error
			logger.warn("Generation failed", { error: errorMessage(error) })
			return this.retryOrFail(state, `SQL generation failed: ${errorMessage(error)}`, state.repairContext)
		}
	}

	private async execute(state: WorkflowState): Promise<WorkflowStage> {
		const { sandbox, feedback, config, logger } = this.context
		state.currentAgent = "sql_executor"

		// Explanations are never run
		if (state.intent === "sql_to_text") return "DONE"

		const sql = state.generatedSQL ?? ""
		let outcome: ExecutionOutcome
		try {
			outcome = await sandbox.execute(sql, {
				timeoutMs: config.execution.timeout_ms,
				maxRows: config.execution.max_rows,
			})
		} catch (error) {
			if (error instanceof CollaboratorUnavailableError) throw error
			outcome = { success: false, errorKind: "other", message: errorMessage(error) }
		}
		state.executionResult = outcome

		if (outcome.success) {
			state.executionError = null
			state.repairContext = null
			logger.info("Execution succeeded", { attempt: state.retryCount + 1 })

			if (state.intent === "text_to_sql") {
				const captured = await feedback.captureSuccess(state)
				logger.debug("Feedback capture", { captured })
			}
			return "DONE"
		}

		logger.info("Execution failed", { attempt: state.retryCount + 1, kind: outcome.errorKind, error: outcome.message })
		return this.retryOrFail(state, outcome.message, { sql, error: outcome.message, sqlstate: outcome.sqlstate })
	}

	private retryOrFail(state: WorkflowState, error: string, repair: RepairContext | null): WorkflowStage {
		state.executionError = error

		if (state.retryCount < state.maxRetries) {
			state.retryCount += 1
			state.repairContext = repair
			state.executionError = null
			this.context.logger.info("Retrying", { retry_count: state.retryCount, max_retries: state.maxRetries })
			return "GENERATE"
		}

		const attempts = state.retryCount + 1
		state.error = `Failed after ${attempts} attempt${attempts === 1 ? "" : "s"} (${state.retryCount} repairs): ${error}`
		return "FAILED"
	}
}

// ============================================================================
// Entry point
// ============================================================================

export interface SqlAgentInput {
	question: string
	/** Overrides `workflow.max_retries` for this request */
	maxRetries?: number
	history?: ChatMessage[]
}

export interface SqlAgentResult {
	requestId: string
	intent: Intent | null
	sql: string | null
	explanation: string | null
	result: ExecutionOutcome | null
	error: string | null
	retryCount: number
	tablesUsed: string[]
	finalState: "DONE" | "FAILED"
	/** User-facing text */
	message: string
	trace: WorkflowStage[]
}

function buildMessage(state: WorkflowState): string {
	if (state.stage === "FAILED") return state.error ?? "Request failed"

	if (state.intent === "chat") {
		const last = state.messages[state.messages.length - 1]
		return last?.role === "assistant" ? last.content : state.error ?? ""
	}
	if (state.intent === "sql_to_text") return state.sqlExplanation ?? ""

	const result = state.executionResult
	if (!result?.success) return state.error ?? ""
	if ("affectedCount" in result) return `Statement affected ${result.affectedCount} rows`

	const table = formatResultTable(result.columns, result.rows)
	return result.truncated ? `${table}\n\n(result limited to ${result.rows.length} rows)` : table
}

/**
 * Run one request through the workflow. Throws CollaboratorUnavailableError
 * when the LLM or database cannot be reached at all.
 */
export async function runSqlAgent(input: SqlAgentInput, context: AgentContext): Promise<SqlAgentResult> {
	const requestId = uuidv4()
	const startTime = Date.now()
	const maxRetries = input.maxRetries ?? context.config.workflow.max_retries

	context.logger.info("SQL agent request", { request_id: requestId, question: input.question })

	const state = createInitialState(input.question, maxRetries, input.history)
	const final = await new WorkflowEngine(context).run(state)

	const finalState = final.stage === "FAILED" ? "FAILED" : "DONE"
	context.logger.info("SQL agent finished", {
		request_id: requestId,
		final_state: finalState,
		intent: final.intent,
		retry_count: final.retryCount,
		latency_ms: Date.now() - startTime,
	})

	return {
		requestId,
		intent: final.intent,
		sql: final.generatedSQL,
		explanation: final.sqlExplanation,
		result: final.executionResult,
		error: final.executionError ?? final.error,
		retryCount: final.retryCount,
		tablesUsed: final.relevantTables,
		finalState,
		message: buildMessage(final),
		trace: final.trace,
	}
}
