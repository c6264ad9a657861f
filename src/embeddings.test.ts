import { describe, it, expect } from "vitest"
import { EmbeddingError } from "./config.js"
import {
	HashEmbeddingProvider,
	OllamaEmbeddingProvider,
	innerProduct,
	normalize,
} from "./embeddings.js"

function norm(vector: Float32Array): number {
	return Math.sqrt(innerProduct(vector, vector))
}

/** fetch stand-in that records request bodies and answers with a fixed response */
function fakeFetch(respond: () => Response, bodies: unknown[] = []): typeof fetch {
	return async (_input, init) => {
		bodies.push(typeof init?.body === "string" ? JSON.parse(init.body) : null)
		return respond()
	}
}

describe("normalize / innerProduct", () => {
	it("scales a vector to unit length", () => {
		const v = normalize(Float32Array.from([3, 4]))
		expect(v[0]).toBeCloseTo(0.6, 6)
		expect(v[1]).toBeCloseTo(0.8, 6)
	})

	it("leaves the zero vector untouched", () => {
		const v = normalize(new Float32Array(3))
		expect(Array.from(v)).toEqual([0, 0, 0])
	})

	it("rejects vectors of different sizes", () => {
		expect(() => innerProduct([1, 0], [1, 0, 0])).toThrow("Vector size mismatch: 2 vs 3")
	})
})

describe("HashEmbeddingProvider", () => {
	const provider = new HashEmbeddingProvider(64)

	it("reports its dimension and model name", () => {
		expect(provider.dimension()).toBe(64)
		expect(provider.modelName).toBe("hash-sha256-64")
	})

	it("produces unit-norm vectors of the configured dimension", async () => {
		const v = await provider.embed("list all products priced above 100")
		expect(v.length).toBe(64)
		expect(norm(v)).toBeCloseTo(1, 5)
	})

	it("is deterministic and case-insensitive", async () => {
		const a = await provider.embed("Top Selling Products")
		const b = await provider.embed("top selling products")
		expect(Array.from(a)).toEqual(Array.from(b))
	})

	it("embedBatch matches embed element by element", async () => {
		const texts = ["count orders per user", "average product rating", "hello"]
		const batch = await provider.embedBatch(texts)
		expect(batch).toHaveLength(3)
		for (let i = 0; i < texts.length; i++) {
			expect(Array.from(batch[i])).toEqual(Array.from(await provider.embed(texts[i])))
		}
	})

	it("scores identical text at 1 and different text lower", async () => {
		const a = await provider.embed("total revenue by category")
		const b = await provider.embed("users who never ordered")
		expect(innerProduct(a, a)).toBeCloseTo(1, 5)
		expect(innerProduct(a, b)).toBeLessThan(0.99)
	})

	it("maps token-less text to the zero vector", async () => {
		const v = await provider.embed("  ?! ")
		expect(norm(v)).toBe(0)
	})

	it("rejects a non-positive dimension", () => {
		expect(() => new HashEmbeddingProvider(0)).toThrow(EmbeddingError)
	})
})

describe("OllamaEmbeddingProvider", () => {
	it("sends one batch request and normalizes each vector", async () => {
		const bodies: unknown[] = []
		const provider = new OllamaEmbeddingProvider({
			baseUrl: "http://ollama.test:11434/",
			model: "nomic-embed-text",
			dimension: 2,
			fetchImpl: fakeFetch(() => new Response(JSON.stringify({ embeddings: [[3, 4], [0, 2]] })), bodies),
		})

		const vectors = await provider.embedBatch(["first", "second"])

		expect(bodies).toEqual([{ model: "nomic-embed-text", input: ["first", "second"] }])
		expect(vectors).toHaveLength(2)
		expect(vectors[0][0]).toBeCloseTo(0.6, 6)
		expect(vectors[0][1]).toBeCloseTo(0.8, 6)
		expect(Array.from(vectors[1])).toEqual([0, 1])
	})

	it("returns an empty list without calling the service", async () => {
		const bodies: unknown[] = []
		const provider = new OllamaEmbeddingProvider({
			baseUrl: "http://ollama.test:11434",
			model: "m",
			dimension: 2,
			fetchImpl: fakeFetch(() => new Response("{}"), bodies),
		})
		expect(await provider.embedBatch([])).toEqual([])
		expect(bodies).toHaveLength(0)
	})

	it("raises EmbeddingError on a non-2xx response", async () => {
		const provider = new OllamaEmbeddingProvider({
			baseUrl: "http://ollama.test:11434",
			model: "m",
			dimension: 2,
			fetchImpl: fakeFetch(() => new Response("model not found", { status: 404 })),
		})
		await expect(provider.embed("x")).rejects.toThrow("Embedding request failed: 404 model not found")
	})

	it("raises EmbeddingError when a vector has the wrong length", async () => {
		const provider = new OllamaEmbeddingProvider({
			baseUrl: "http://ollama.test:11434",
			model: "m",
			dimension: 3,
			fetchImpl: fakeFetch(() => new Response(JSON.stringify({ embeddings: [[1, 0]] }))),
		})
		await expect(provider.embed("x")).rejects.toBeInstanceOf(EmbeddingError)
	})

	it("raises EmbeddingError when the service is unreachable", async () => {
		const provider = new OllamaEmbeddingProvider({
			baseUrl: "http://ollama.test:11434",
			model: "m",
			dimension: 2,
			fetchImpl: async () => {
				throw new TypeError("fetch failed")
			},
		})
		await expect(provider.embed("x")).rejects.toThrow(
			"Cannot reach embedding service at http://ollama.test:11434: fetch failed",
		)
	})
})
