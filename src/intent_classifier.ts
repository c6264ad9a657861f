/**
 * Intent Classifier
 *
 * Two tiers:
 *   1. Keyword fast path (deterministic, fixed confidence)
 *   2. LLM classification with JSON output, validated by zod
 *
 * A malformed or failed LLM answer falls back to the configured default
 * intent. Only an unreachable LLM service escapes as an error.
 */

import { z } from "zod"
import { ClassificationError, CollaboratorUnavailableError, SqlAgentError } from "./config.js"
import { INTENTS, type Intent } from "./config/loadConfig.js"
import type { LLMClient } from "./llm_client.js"
import { silentLogger, type Logger } from "./logger.js"
import { buildIntentPrompt, userTurn } from "./prompts.js"

export type IntentSource = "fast_path" | "llm" | "fallback"

export interface IntentClassification {
	intent: Intent
	confidence: number
	reasoning: string
	source: IntentSource
}

export interface ClassifyOptions {
	defaultIntent: Intent
	fastPathConfidence: number
	logger?: Logger
}

// ============================================================================
// Fast path
// ============================================================================

const EMBEDDED_SQL = /\bselect\b[\s\S]+\bfrom\b/i
// A statement keyword alone is not enough: "Update me" and "With last month's orders" are questions
const LEADING_SQL =
	/^\s*(select\b[\s\S]+\bfrom\b|with\s+(recursive\s+)?\w+(\s*\([^)]*\))?\s+as\s*\(|insert\s+into\b|update\s+\w+\s+set\b|delete\s+from\b)/i
const DEBUG_TERMS = /\b(error|errors|fix|debug|wrong|fails?|failing|broken|bug)\b/i
const EXPLAIN_TERMS = /\b(explain|meaning|mean|means|describe)\b/i
const GREETING = /^\s*(hi|hello|hey|thanks|thank you|good (morning|afternoon|evening)|who are you|how are you)\b/i
const DATA_REQUEST = /\b(query|list|show|find|count|how many|top|total|average)\b/i
const DATA_TERMS = /\b(sql|table|tables|database|data|rows?|records?)\b/i

/**
 * Keyword rules. Returns null when the text is inconclusive.
 */
export function classifyByKeywords(text: string, confidence: number): IntentClassification | null {
	const hit = (intent: Intent, reasoning: string): IntentClassification => ({
		intent,
		confidence,
		reasoning,
		source: "fast_path",
	})

	const hasSql = EMBEDDED_SQL.test(text) || LEADING_SQL.test(text)

	if (hasSql && DEBUG_TERMS.test(text)) return hit("debug", "SQL with error or fix wording")
	if (hasSql && EXPLAIN_TERMS.test(text)) return hit("sql_to_text", "SQL with explain wording")
	if (LEADING_SQL.test(text)) return hit("sql_to_text", "bare SQL statement")
	if (GREETING.test(text) && !DATA_REQUEST.test(text) && !DATA_TERMS.test(text)) {
		return hit("chat", "greeting or small talk")
	}
	if (DATA_REQUEST.test(text)) return hit("text_to_sql", "data request wording")

	return null
}

// ============================================================================
// LLM path
// ============================================================================

const intentResponseSchema = z.object({
	intent: z.enum(INTENTS),
	confidence: z.number().min(0).max(1),
	reasoning: z.string().default(""),
})

/**
 * Parse the classifier's JSON answer, tolerating code fences and prose
 * around the object.
 */
export function parseIntentResponse(raw: string): Omit<IntentClassification, "source"> {
	const start = raw.indexOf("{")
	const end = raw.lastIndexOf("}")
	if (start === -1 || end <= start) {
		throw new ClassificationError("Classifier response contains no JSON object", { raw })
	}

	let json: unknown
	try {
		json = JSON.parse(raw.slice(start, end + 1))
	} catch {
		throw new ClassificationError("Classifier response is not valid JSON", { raw })
	}

	const parsed = intentResponseSchema.safeParse(json)
	if (!parsed.success) {
		throw new ClassificationError(`Classifier response failed validation: ${parsed.error.issues[0]?.message}`, {
			raw,
		})
	}
	return parsed.data
}

export async function classifyIntent(
	text: string,
	llm: LLMClient,
	options: ClassifyOptions,
): Promise<IntentClassification> {
	const logger = options.logger ?? silentLogger

	const fast = classifyByKeywords(text, options.fastPathConfidence)
	if (fast) {
		logger.debug("Intent fast path", { intent: fast.intent, reasoning: fast.reasoning })
		return fast
	}

	try {
		const raw = await llm.complete(userTurn(buildIntentPrompt(text)), { temperature: 0 })
		const result = parseIntentResponse(raw)
		logger.debug("Intent classified by LLM", { intent: result.intent, confidence: result.confidence })
		return { ...result, source: "llm" }
	} catch (error) {
		if (error instanceof CollaboratorUnavailableError) throw error
		if (!(error instanceof SqlAgentError)) throw error

		logger.warn("Intent classification failed, using default intent", {
			default_intent: options.defaultIntent,
			error: error.message,
		})
		return {
			intent: options.defaultIntent,
			confidence: 0,
			reasoning: `classification failed: ${error.message}`,
			source: "fallback",
		}
	}
}
