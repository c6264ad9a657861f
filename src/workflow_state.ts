/**
 * Per-request workflow state. Created for one request, mutated by each
 * stage, dropped at DONE/FAILED.
 */

import type { ExecutionOutcome } from "./config.js"
import type { Intent } from "./config/loadConfig.js"
import type { ChatMessage } from "./llm_client.js"
import type { TableSchema } from "./schema_introspector.js"

export const WORKFLOW_STAGES = ["INTENT", "CHAT", "SCHEMA", "GENERATE", "EXECUTE", "DONE", "FAILED"] as const
export type WorkflowStage = (typeof WORKFLOW_STAGES)[number]

export interface SchemaInfo {
	tables: TableSchema[]
	formatted: string
}

/** Prior statement and its failure, fed to GENERATE in repair mode */
export interface RepairContext {
	sql: string
	error: string
	sqlstate?: string
}

export interface WorkflowState {
	messages: ChatMessage[]
	intent: Intent | null
	intentConfidence: number | null
	userQuery: string
	schemaInfo: SchemaInfo | null
	relevantTables: string[]
	generatedSQL: string | null
	sqlExplanation: string | null
	executionResult: ExecutionOutcome | null
	executionError: string | null
	retryCount: number
	maxRetries: number
	currentAgent: string | null
	error: string | null
	repairContext: RepairContext | null
	stage: WorkflowStage
	trace: WorkflowStage[]
}

export function createInitialState(userQuery: string, maxRetries: number, history: ChatMessage[] = []): WorkflowState {
	if (!Number.isInteger(maxRetries) || maxRetries < 0) {
		throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`)
	}
	return {
		messages: [...history, { role: "user", content: userQuery }],
		intent: null,
		intentConfidence: null,
		userQuery,
		schemaInfo: null,
		relevantTables: [],
		generatedSQL: null,
		sqlExplanation: null,
		executionResult: null,
		executionError: null,
		retryCount: 0,
		maxRetries,
		currentAgent: null,
		error: null,
		repairContext: null,
		stage: "INTENT",
		trace: [],
	}
}
