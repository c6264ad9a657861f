/**
 * Feedback Recorder
 *
 * Writes successfully executed (question, SQL) pairs back into the example
 * store so later requests can retrieve them. Best-effort: every failure is
 * logged and reported as `false`, never thrown.
 */

import { errorMessage, type Complexity } from "./config.js"
import type { ExampleStore } from "./example_store.js"
import { silentLogger, type Logger } from "./logger.js"
import type { WorkflowState } from "./workflow_state.js"

export type FeedbackSource = Pick<WorkflowState, "executionResult" | "userQuery" | "generatedSQL" | "relevantTables">

/**
 * Weighted feature score over the SQL text:
 *   JOIN +1, GROUP BY +1, HAVING +1, subquery after the first FROM +2,
 *   more than one JOIN +1, UNION +2
 * Score <= 1 is simple, <= 3 medium, otherwise complex.
 */
export function estimateComplexity(sql: string): Complexity {
	const upper = sql.toUpperCase()
	let score = 0

	if (upper.includes("JOIN")) score += 1
	if (upper.includes("GROUP BY")) score += 1
	if (upper.includes("HAVING")) score += 1

	const fromAt = upper.indexOf("FROM")
	if (upper.includes("SUBQUERY") || (fromAt !== -1 && upper.slice(fromAt).includes("SELECT"))) score += 2

	if (upper.split("JOIN").length - 1 > 1) score += 1
	if (upper.includes("UNION")) score += 2

	if (score <= 1) return "simple"
	if (score <= 3) return "medium"
	return "complex"
}

export interface FeedbackRecorderOptions {
	/** Where to persist after each capture; nothing is written when absent */
	persistDir?: string
	logger?: Logger
}

export class FeedbackRecorder {
	private readonly store: ExampleStore
	private readonly persistDir?: string
	private readonly logger: Logger

	constructor(store: ExampleStore, options: FeedbackRecorderOptions = {}) {
		this.store = store
		this.persistDir = options.persistDir
		this.logger = options.logger ?? silentLogger
	}

	/**
	 * True when a new example was stored. Duplicate SQL, a failed execution or
	 * missing query/SQL text return false without side effects.
	 */
	async captureSuccess(state: FeedbackSource): Promise<boolean> {
		if (!state.executionResult?.success) return false

		const userQuery = state.userQuery.trim()
		const sql = state.generatedSQL?.trim() ?? ""
		if (!userQuery || !sql) return false

		try {
			const ids = await this.store.add([
				{
					naturalQuery: userQuery,
					sql,
					tables: [...state.relevantTables],
					complexity: estimateComplexity(sql),
					tags: ["learned"],
					source: "feedback_loop",
				},
			])
			if (ids.length === 0) {
				this.logger.debug("Feedback skipped, SQL already known")
				return false
			}

			if (this.persistDir) this.store.persist(this.persistDir)
			this.logger.info("Captured successful query", { id: ids[0], total: this.store.count })
			return true
		} catch (error) {
			this.logger.warn("Feedback capture failed", { error: errorMessage(error) })
			return false
		}
	}
}
