/**
 * Example Store
 *
 * Few-shot (question, SQL) pairs for retrieval-augmented generation.
 * Composes an EmbeddingProvider with a VectorIndex and adds:
 * - schema filtering (only examples touching the relevant tables)
 * - complexity-aware re-ranking
 * - exact-SQL dedup on ingestion
 *
 * Writes (add/seed) are serialized through a single queue; searches read the
 * current in-memory state and never wait on it.
 */

import * as fs from "fs"
import { z } from "zod"
import {
	COMPLEXITY_RANK,
	COMPLEXITIES,
	DEFAULTS,
	EmbeddingError,
	PersistenceError,
	errorMessage,
	exampleFileSchema,
	exampleFromFile,
	type Example,
	type ExampleInput,
	type RetrievalQuery,
	type RetrievalResult,
} from "./config.js"
import type { EmbeddingProvider } from "./embeddings.js"
import { silentLogger, type Logger } from "./logger.js"
import { VectorIndex, type BackendPreference, type MetadataCodec } from "./vector_index.js"

export interface ExampleStoreOptions {
	embedder: EmbeddingProvider
	/** Knowledge-base directory used by persist()/load() when none is passed */
	dir?: string
	backend?: BackendPreference
	overFetchMultiplier?: number
	complexityPenalty?: number
	logger?: Logger
}

const storedExampleSchema = z.object({
	natural_query: z.string(),
	sql: z.string(),
	tables: z.array(z.string()),
	complexity: z.enum(COMPLEXITIES),
	tags: z.array(z.string()),
	source: z.string().optional(),
	created_at: z.string().optional(),
})

const exampleCodec: MetadataCodec<ExampleInput> = {
	encode: (example) => ({
		natural_query: example.naturalQuery,
		sql: example.sql,
		tables: example.tables,
		complexity: example.complexity,
		tags: example.tags,
		source: example.source,
		created_at: example.createdAt,
	}),
	decode: (raw) => {
		const parsed = storedExampleSchema.parse(raw)
		return {
			naturalQuery: parsed.natural_query,
			sql: parsed.sql,
			tables: parsed.tables,
			complexity: parsed.complexity,
			tags: parsed.tags,
			source: parsed.source,
			createdAt: parsed.created_at,
		}
	},
}

export class ExampleStore {
	private readonly embedder: EmbeddingProvider
	private readonly index: VectorIndex<ExampleInput>
	private readonly dir?: string
	private readonly complexityPenalty: number
	private readonly logger: Logger
	private readonly knownSql = new Set<string>()
	private writeQueue: Promise<unknown> = Promise.resolve()

	constructor(options: ExampleStoreOptions) {
		this.embedder = options.embedder
		this.dir = options.dir
		this.complexityPenalty = options.complexityPenalty ?? DEFAULTS.complexityPenalty
		this.logger = options.logger ?? silentLogger
		this.index = new VectorIndex(options.embedder.dimension(), {
			codec: exampleCodec,
			backend: options.backend,
			overFetchMultiplier: options.overFetchMultiplier ?? DEFAULTS.overFetchMultiplier,
			model: options.embedder.modelName,
			logger: this.logger,
		})
	}

	get count(): number {
		return this.index.count
	}

	get dimension(): number {
		return this.index.dimension
	}

	get backend(): string {
		return this.index.backendName
	}

	get modelName(): string {
		return this.embedder.modelName
	}

	/**
	 * Most similar examples for a question.
	 *
	 * Empty store, no example passing the table filter, or an unreachable
	 * embedding provider all yield [] (no augmentation).
	 */
	async retrieve(query: RetrievalQuery): Promise<RetrievalResult> {
		if (this.count === 0 || query.k <= 0) return []

		let vector: Float32Array
		try {
			vector = await this.embedder.embed(query.text)
		} catch (error) {
			if (error instanceof EmbeddingError) {
				this.logger.warn("Example retrieval skipped, embedding failed", { error: error.message })
				return []
			}
			throw error
		}

		const wanted = new Set(query.relevantTables ?? [])
		const matchesSchema = (example: ExampleInput) =>
			wanted.size === 0 || example.tables.some((table) => wanted.has(table))

		let results: RetrievalResult = this.index
			.candidates(vector, query.k, matchesSchema)
			.map((hit) => ({ example: { id: hit.id, ...hit.metadata }, score: hit.score }))

		const hint = query.complexityHint
		if (hint) {
			results = results
				.map(({ example, score }) => ({
					example,
					score:
						score -
						this.complexityPenalty * Math.abs(COMPLEXITY_RANK[hint] - COMPLEXITY_RANK[example.complexity]),
				}))
				.sort((a, b) => b.score - a.score)
		}

		results = results.slice(0, query.k)
		this.logger.debug("Examples retrieved", {
			count: results.length,
			tables: [...wanted],
			complexity_hint: hint ?? null,
		})
		return results
	}

	/**
	 * Embed and store examples whose SQL text is not already stored.
	 * Returns the ids of the examples actually inserted.
	 */
	add(examples: ExampleInput[]): Promise<string[]> {
		return this.serialize(async () => {
			const batchSql = new Set<string>()
			const fresh = examples.filter((example) => {
				if (this.knownSql.has(example.sql) || batchSql.has(example.sql)) return false
				batchSql.add(example.sql)
				return true
			})

			if (fresh.length < examples.length) {
				this.logger.debug("Skipped duplicate examples", { skipped: examples.length - fresh.length })
			}
			if (fresh.length === 0) return []

			const vectors = await this.embedder.embedBatch(fresh.map((example) => example.naturalQuery))
			const now = new Date().toISOString()
			const ids = this.index.add(
				vectors,
				fresh.map((example) => ({ ...example, createdAt: example.createdAt ?? now })),
			)
			for (const example of fresh) this.knownSql.add(example.sql)

			this.logger.info("Examples added", { added: ids.length, total: this.count })
			return ids
		})
	}

	/**
	 * Load a JSON array of examples and add them. Returns the number added.
	 */
	async seedFromFile(filePath: string): Promise<number> {
		let entries: Array<z.infer<typeof exampleFileSchema>>
		try {
			entries = z.array(exampleFileSchema).parse(JSON.parse(fs.readFileSync(filePath, "utf-8")))
		} catch (error) {
			throw new PersistenceError(`Cannot read seed examples from ${filePath}: ${errorMessage(error)}`, {
				file: filePath,
			})
		}

		const ids = await this.add(entries.map((entry) => ({ ...exampleFromFile(entry), source: entry.source ?? "seed" })))
		return ids.length
	}

	/** Stored examples in insertion order */
	list(limit?: number): Example[] {
		const all = this.index.list().map(({ id, metadata }) => ({ id, ...metadata }))
		return limit === undefined ? all : all.slice(0, limit)
	}

	/**
	 * Prompt block for retrieved examples. No results, no block.
	 */
	format(results: RetrievalResult): string {
		if (results.length === 0) return ""

		const lines = ["## Similar SQL Examples", ""]
		results.forEach(({ example }, i) => {
			lines.push(`### Example ${i + 1}`)
			lines.push(`**Query**: ${example.naturalQuery}`)
			lines.push(`**Tables**: ${example.tables.join(", ")}`)
			lines.push("```sql", example.sql, "```", "")
		})
		return lines.join("\n").trimEnd()
	}

	persist(dir: string | undefined = this.dir): void {
		if (!dir) throw new PersistenceError("No knowledge-base directory configured")
		this.index.persist(dir)
		this.logger.info("Knowledge base saved", { dir, count: this.count })
	}

	/**
	 * Restore from disk. Missing or unreadable files leave the store empty;
	 * a dimension mismatch with the active embedder is thrown.
	 */
	load(dir: string | undefined = this.dir): boolean {
		if (!dir) throw new PersistenceError("No knowledge-base directory configured")

		let loaded: boolean
		try {
			loaded = this.index.load(dir)
		} catch (error) {
			if (!(error instanceof PersistenceError)) throw error
			this.logger.warn("Knowledge base unreadable, starting empty", { dir, error: error.message })
			this.index.clear()
			loaded = false
		}

		this.knownSql.clear()
		for (const { metadata } of this.index.list()) this.knownSql.add(metadata.sql)

		this.logger.info("Knowledge base loaded", { dir, count: this.count, found: loaded })
		return loaded
	}

	clear(): void {
		this.index.clear()
		this.knownSql.clear()
	}

	private serialize<T>(task: () => Promise<T>): Promise<T> {
		const run = this.writeQueue.then(task)
		this.writeQueue = run.catch((error: unknown) => {
			this.logger.debug("Queued knowledge-base write failed", { error: errorMessage(error) })
		})
		return run
	}
}
