import { describe, it, expect } from "vitest"
import { ClassificationError, CollaboratorUnavailableError, SqlAgentError } from "./config.js"
import { classifyByKeywords, classifyIntent, parseIntentResponse } from "./intent_classifier.js"
import type { ChatMessage, CompletionOptions, LLMClient } from "./llm_client.js"

/** LLM stand-in answering from a queue; an Error entry is thrown instead */
class ScriptedLLM implements LLMClient {
	readonly model = "scripted"
	readonly calls: Array<{ messages: ChatMessage[]; options?: CompletionOptions }> = []

	constructor(private readonly answers: Array<string | Error>) {}

	async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
		this.calls.push({ messages, options })
		const next = this.answers.shift()
		if (next === undefined) throw new Error("no scripted answer left")
		if (next instanceof Error) throw next
		return next
	}
}

const options = { defaultIntent: "chat" as const, fastPathConfidence: 0.9 }

describe("classifyByKeywords", () => {
	it.each([
		["SELECT * FROM users WHERE id = 1 gives an error, fix it", "debug"],
		["Explain this query: SELECT name FROM products", "sql_to_text"],
		["SELECT id FROM orders", "sql_to_text"],
		["with t as (select 1) select * from t", "sql_to_text"],
		["WITH RECURSIVE n(i) AS (SELECT 1) SELECT i FROM n", "sql_to_text"],
		["UPDATE orders SET status = 'shipped' WHERE id = 4", "sql_to_text"],
		["With last month's orders, show the top 5 customers", "text_to_sql"],
		["Update me: how many orders shipped today?", "text_to_sql"],
		["Delete nothing, just list all products", "text_to_sql"],
		["Select the top 5 customers by revenue", "text_to_sql"],
		["hello there", "chat"],
		["hi, show me all tables", "text_to_sql"],
		["List all users who signed up in May", "text_to_sql"],
		["How many orders were placed yesterday", "text_to_sql"],
	])("%s -> %s", (text, intent) => {
		const result = classifyByKeywords(text, 0.9)
		expect(result?.intent).toBe(intent)
		expect(result?.confidence).toBe(0.9)
		expect(result?.source).toBe("fast_path")
	})

	it("returns null when nothing matches", () => {
		expect(classifyByKeywords("what is the weather like", 0.9)).toBeNull()
	})
})

describe("parseIntentResponse", () => {
	it("reads a fenced JSON answer", () => {
		const raw = '```json\n{"intent": "debug", "confidence": 0.8, "reasoning": "mentions an error"}\n```'
		expect(parseIntentResponse(raw)).toEqual({ intent: "debug", confidence: 0.8, reasoning: "mentions an error" })
	})

	it("defaults missing reasoning", () => {
		expect(parseIntentResponse('Sure! {"intent": "chat", "confidence": 0.5}')).toEqual({
			intent: "chat",
			confidence: 0.5,
			reasoning: "",
		})
	})

	it("rejects text without an object", () => {
		expect(() => parseIntentResponse("text_to_sql")).toThrow("Classifier response contains no JSON object")
	})

	it("rejects malformed JSON", () => {
		expect(() => parseIntentResponse("{intent: debug}")).toThrow("Classifier response is not valid JSON")
	})

	it("rejects unknown intents and out-of-range confidence", () => {
		expect(() => parseIntentResponse('{"intent": "dance", "confidence": 0.5}')).toThrow(ClassificationError)
		expect(() => parseIntentResponse('{"intent": "chat", "confidence": 1.5}')).toThrow(ClassificationError)
	})
})

describe("classifyIntent", () => {
	it("answers from the fast path without calling the LLM", async () => {
		const llm = new ScriptedLLM([])
		const result = await classifyIntent("list all products", llm, options)
		expect(result.intent).toBe("text_to_sql")
		expect(llm.calls).toHaveLength(0)
	})

	it("asks the LLM at temperature 0 when keywords are inconclusive", async () => {
		const llm = new ScriptedLLM(['{"intent": "text_to_sql", "confidence": 0.7, "reasoning": "asks for data"}'])
		const result = await classifyIntent("what is the weather like", llm, options)

		expect(result).toEqual({ intent: "text_to_sql", confidence: 0.7, reasoning: "asks for data", source: "llm" })
		expect(llm.calls).toHaveLength(1)
		expect(llm.calls[0].options).toEqual({ temperature: 0 })
		expect(llm.calls[0].messages[0].role).toBe("user")
		expect(llm.calls[0].messages[0].content).toContain("what is the weather like")
	})

	it("falls back to the default intent on an unusable answer", async () => {
		const result = await classifyIntent("what is the weather like", new ScriptedLLM(["no idea"]), options)
		expect(result).toEqual({
			intent: "chat",
			confidence: 0,
			reasoning: "classification failed: Classifier response contains no JSON object",
			source: "fallback",
		})
	})

	it("falls back on a timed-out request", async () => {
		const llm = new ScriptedLLM([new SqlAgentError("timeout", "LLM request timed out", true)])
		const result = await classifyIntent("what is the weather like", llm, { ...options, defaultIntent: "text_to_sql" })
		expect(result.intent).toBe("text_to_sql")
		expect(result.source).toBe("fallback")
	})

	it("propagates an unreachable LLM", async () => {
		const llm = new ScriptedLLM([new CollaboratorUnavailableError("llm", "Cannot connect to LLM service")])
		await expect(classifyIntent("what is the weather like", llm, options)).rejects.toBeInstanceOf(
			CollaboratorUnavailableError,
		)
	})
})
