/**
 * Embedding Providers
 *
 * Every provider returns unit-normalized Float32Array vectors so that the
 * inner product between two vectors is their cosine similarity.
 *
 * - HashEmbeddingProvider: deterministic SHA-256 feature hashing, no service needed
 * - OllamaEmbeddingProvider: Ollama /api/embed
 *
 * Providers never retry; a failure surfaces as EmbeddingError.
 */

import crypto from "crypto"
import { z } from "zod"
import { EmbeddingError, errorMessage } from "./config.js"
import type { SqlAgentConfig } from "./config/loadConfig.js"

export type EmbeddingVector = Float32Array

export interface EmbeddingProvider {
	/** Model identifier recorded alongside persisted vectors */
	readonly modelName: string
	embed(text: string): Promise<EmbeddingVector>
	/** Order-preserving; `embedBatch(texts)[i]` equals `embed(texts[i])` */
	embedBatch(texts: string[]): Promise<EmbeddingVector[]>
	dimension(): number
}

/**
 * Scale a vector to unit length in place. The zero vector is left as is.
 */
export function normalize(vector: EmbeddingVector): EmbeddingVector {
	let sum = 0
	for (let i = 0; i < vector.length; i++) sum += vector[i] * vector[i]
	const norm = Math.sqrt(sum)
	if (norm > 0) {
		for (let i = 0; i < vector.length; i++) vector[i] /= norm
	}
	return vector
}

export function innerProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
	if (a.length !== b.length) throw new Error(`Vector size mismatch: ${a.length} vs ${b.length}`)
	let dot = 0
	for (let i = 0; i < a.length; i++) dot += a[i] * b[i]
	return dot
}

// ============================================================================
// Hash embedding
// ============================================================================

const TOKEN_RE = /[\p{L}\p{N}_]+/gu

/**
 * Deterministic local embedding using SHA-256 feature hashing.
 * Lower-cased word tokens each add a signed weight to three buckets.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
	readonly modelName: string
	private readonly dim: number

	constructor(dim: number = 384) {
		if (!Number.isInteger(dim) || dim <= 0) {
			throw new EmbeddingError(`Invalid embedding dimension: ${dim}`)
		}
		this.dim = dim
		this.modelName = `hash-sha256-${dim}`
	}

	dimension(): number {
		return this.dim
	}

	async embed(text: string): Promise<EmbeddingVector> {
		return this.embedSync(text)
	}

	async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
		return texts.map((text) => this.embedSync(text))
	}

	private embedSync(text: string): EmbeddingVector {
		const vector = new Float32Array(this.dim)
		const tokens = text.toLowerCase().match(TOKEN_RE) ?? []

		for (const token of tokens) {
			const digest = crypto.createHash("sha256").update(token).digest()
			const bucket = digest.readUInt32BE(0) % this.dim
			const sign = (digest[4] & 1) === 0 ? 1 : -1
			vector[bucket] += sign * 1.0
			vector[(bucket + 97) % this.dim] += sign * 0.5
			vector[(bucket + 211) % this.dim] += sign * 0.25
		}

		return normalize(vector)
	}
}

// ============================================================================
// Ollama embedding
// ============================================================================

const embedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
})

export interface OllamaEmbeddingOptions {
	baseUrl: string
	model: string
	dimension: number
	timeoutMs?: number
	fetchImpl?: typeof fetch
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
	readonly modelName: string
	private readonly baseUrl: string
	private readonly dim: number
	private readonly timeoutMs: number
	private readonly fetchImpl: typeof fetch

	constructor(options: OllamaEmbeddingOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.modelName = options.model
		this.dim = options.dimension
		this.timeoutMs = options.timeoutMs ?? 30000
		this.fetchImpl = options.fetchImpl ?? fetch
	}

	dimension(): number {
		return this.dim
	}

	async embed(text: string): Promise<EmbeddingVector> {
		const [vector] = await this.embedBatch([text])
		return vector
	}

	/**
	 * One request for the whole batch. Ollama returns embeddings in input order.
	 */
	async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
		if (texts.length === 0) return []

		const url = `${this.baseUrl}/api/embed`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

		let body: unknown
		try {
			const response = await this.fetchImpl(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({ model: this.modelName, input: texts }),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new EmbeddingError(`Embedding request failed: ${response.status} ${errorText}`, {
					statusCode: response.status,
					url,
				})
			}

			body = await response.json()
		} catch (error) {
			if (error instanceof EmbeddingError) throw error
			if (error instanceof Error && error.name === "AbortError") {
				throw new EmbeddingError(`Embedding request timed out after ${this.timeoutMs}ms`, { url })
			}
			throw new EmbeddingError(`Cannot reach embedding service at ${this.baseUrl}: ${errorMessage(error)}`, { url })
		} finally {
			clearTimeout(timeoutId)
		}

		const parsed = embedResponseSchema.safeParse(body)
		if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
			throw new EmbeddingError("Embedding response does not contain one vector per input", {
				expected: texts.length,
			})
		}

		return parsed.data.embeddings.map((raw, i) => {
			if (raw.length !== this.dim) {
				throw new EmbeddingError(`Embedding ${i} has wrong shape; expected ${this.dim} numbers`, {
					model: this.modelName,
				})
			}
			return normalize(Float32Array.from(raw))
		})
	}
}

/**
 * Select the embedding provider named by configuration.
 */
export function createEmbeddingProvider(config: SqlAgentConfig): EmbeddingProvider {
	const { embedding, model } = config
	switch (embedding.provider) {
		case "ollama":
			return new OllamaEmbeddingProvider({
				baseUrl: model.ollama_url,
				model: embedding.model,
				dimension: embedding.dimension,
				timeoutMs: model.timeout,
			})
		case "hash":
			return new HashEmbeddingProvider(embedding.dimension)
	}
}
