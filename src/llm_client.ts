/**
 * LLM Client
 *
 * Request/response chat completion against Ollama's /api/chat.
 *
 * Error mapping:
 * - service unreachable (connection refused, DNS)  -> CollaboratorUnavailableError
 * - request timeout                                -> SqlAgentError("timeout"), recoverable
 * - non-2xx / unusable body                        -> SqlAgentError("generation")
 */

import { z } from "zod"
import { CollaboratorUnavailableError, SqlAgentError, errorMessage } from "./config.js"
import type { SqlAgentConfig } from "./config/loadConfig.js"

export type ChatRole = "system" | "user" | "assistant"

export interface ChatMessage {
	role: ChatRole
	content: string
}

export interface CompletionOptions {
	temperature?: number
}

export interface LLMClient {
	readonly model: string
	complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>
}

const chatResponseSchema = z.object({
	message: z.object({
		content: z.string(),
	}),
})

export interface OllamaChatOptions {
	baseUrl: string
	model: string
	timeoutMs: number
	temperature?: number
	fetchImpl?: typeof fetch
}

export class OllamaChatClient implements LLMClient {
	readonly model: string
	private readonly baseUrl: string
	private readonly timeout: number
	private readonly temperature: number
	private readonly fetchImpl: typeof fetch

	constructor(options: OllamaChatOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.model = options.model
		this.timeout = options.timeoutMs
		this.temperature = options.temperature ?? 0.1
		this.fetchImpl = options.fetchImpl ?? fetch
	}

	async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
		const url = `${this.baseUrl}/api/chat`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)

		try {
			const response = await this.fetchImpl(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					model: this.model,
					messages,
					stream: false,
					options: { temperature: options.temperature ?? this.temperature },
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new SqlAgentError(
					"generation",
					`LLM service returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, model: this.model },
				)
			}

			const parsed = chatResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new SqlAgentError("generation", "LLM response has no message content", true, {
					model: this.model,
				})
			}
			return parsed.data.message.content
		} catch (error) {
			if (error instanceof SqlAgentError) throw error

			if (error instanceof Error && error.name === "AbortError") {
				throw new SqlAgentError("timeout", `LLM request timed out after ${this.timeout}ms`, true, {
					timeout: this.timeout,
					url,
				})
			}

			// fetch rejects with TypeError when the service cannot be reached
			if (error instanceof TypeError) {
				throw new CollaboratorUnavailableError("llm", `Cannot connect to LLM service at ${this.baseUrl}. Is it running?`, {
					baseUrl: this.baseUrl,
					originalError: error.message,
				})
			}

			throw new SqlAgentError("generation", `Unexpected error calling LLM service: ${errorMessage(error)}`, false)
		} finally {
			clearTimeout(timeoutId)
		}
	}
}

export function createLLMClient(config: SqlAgentConfig): LLMClient {
	return new OllamaChatClient({
		baseUrl: config.model.ollama_url,
		model: config.model.llm,
		timeoutMs: config.model.timeout,
		temperature: config.model.temperature,
	})
}
