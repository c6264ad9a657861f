/**
 * Vector Index
 *
 * Append-only nearest-neighbor store over unit-norm vectors, scored by inner
 * product (= cosine similarity). Each entry carries an id and a metadata record.
 *
 * Persisted layout (one directory):
 *   index.bin      "SQLV" | u32 version | u32 dimension | u32 count | count*dimension f32 (LE)
 *   metadata.json  { version, dimension, backend, model, documents: [{ id, ...metadata }] }
 *
 * Both files are written to a temp sibling first and renamed into place.
 */

import * as fs from "fs"
import * as path from "path"
import { v4 as uuidv4 } from "uuid"
import { z } from "zod"
import { PersistenceError, VectorIndexError, errorMessage } from "./config.js"
import type { EmbeddingVector } from "./embeddings.js"
import { silentLogger, type Logger } from "./logger.js"

export const INDEX_FILE = "index.bin"
export const METADATA_FILE = "metadata.json"

const MAGIC = "SQLV"
const FORMAT_VERSION = 1
const HEADER_BYTES = 16

// ============================================================================
// Backends
// ============================================================================

export interface BackendHit {
	position: number
	score: number
}

/**
 * Capability set every backend provides. Positions are insertion order.
 */
export interface VectorBackend {
	readonly name: string
	readonly size: number
	add(vectors: EmbeddingVector[]): void
	/** Top `limit` positions by descending inner product */
	search(query: EmbeddingVector, limit: number): BackendHit[]
	/** Contiguous copy of all stored vectors, insertion order */
	snapshot(): Float32Array
	reset(): void
}

/**
 * Exact brute-force inner-product search over one growable Float32Array.
 */
export class FlatInnerProductBackend implements VectorBackend {
	readonly name = "flat"
	private data: Float32Array
	private count = 0

	constructor(private readonly dimension: number, initialCapacity: number = 64) {
		this.data = new Float32Array(dimension * initialCapacity)
	}

	get size(): number {
		return this.count
	}

	add(vectors: EmbeddingVector[]): void {
		const needed = (this.count + vectors.length) * this.dimension
		if (needed > this.data.length) {
			let capacity = Math.max(this.data.length, this.dimension)
			while (capacity < needed) capacity *= 2
			const grown = new Float32Array(capacity)
			grown.set(this.data.subarray(0, this.count * this.dimension))
			this.data = grown
		}
		for (const vector of vectors) {
			this.data.set(vector, this.count * this.dimension)
			this.count++
		}
	}

	search(query: EmbeddingVector, limit: number): BackendHit[] {
		const hits: BackendHit[] = []
		for (let position = 0; position < this.count; position++) {
			const offset = position * this.dimension
			let score = 0
			for (let i = 0; i < this.dimension; i++) score += query[i] * this.data[offset + i]
			hits.push({ position, score })
		}
		// Ties keep insertion order
		hits.sort((a, b) => b.score - a.score || a.position - b.position)
		return hits.slice(0, limit)
	}

	snapshot(): Float32Array {
		return this.data.slice(0, this.count * this.dimension)
	}

	reset(): void {
		this.data = new Float32Array(this.dimension * 64)
		this.count = 0
	}
}

export type BackendPreference = "auto" | "flat"

export interface BackendChoice {
	backend: VectorBackend
	reason: string
}

/**
 * Decide the backend once, at construction. No accelerated backend ships in
 * this build, so "auto" resolves to the flat backend with identical search
 * semantics.
 */
export function selectVectorBackend(dimension: number, preference: BackendPreference): BackendChoice {
	if (preference === "flat") {
		return { backend: new FlatInnerProductBackend(dimension), reason: "flat backend requested" }
	}
	return {
		backend: new FlatInnerProductBackend(dimension),
		reason: "no accelerated backend available; using exact flat search",
	}
}

// ============================================================================
// Index
// ============================================================================

/**
 * Converts metadata to and from its persisted JSON object form.
 */
export interface MetadataCodec<M> {
	encode(metadata: M): Record<string, unknown>
	decode(raw: Record<string, unknown>): M
}

export interface SearchHit<M> {
	id: string
	metadata: M
	score: number
}

export interface VectorIndexOptions<M> {
	codec: MetadataCodec<M>
	backend?: BackendPreference
	/** Candidate pool multiplier applied when a predicate is supplied */
	overFetchMultiplier?: number
	/** Recorded in metadata.json */
	model?: string
	logger?: Logger
}

interface Entry<M> {
	id: string
	metadata: M
}

const metadataFileSchema = z.object({
	version: z.number(),
	dimension: z.number().int().positive(),
	backend: z.string().optional(),
	model: z.string().optional(),
	documents: z.array(z.object({ id: z.string() }).passthrough()),
})

export class VectorIndex<M> {
	readonly dimension: number
	readonly backendName: string
	private backend: VectorBackend
	private entries: Entry<M>[] = []
	private ids = new Set<string>()
	private readonly codec: MetadataCodec<M>
	private readonly overFetchMultiplier: number
	private readonly model?: string
	private readonly logger: Logger

	constructor(dimension: number, options: VectorIndexOptions<M>) {
		this.dimension = dimension
		this.codec = options.codec
		this.overFetchMultiplier = options.overFetchMultiplier ?? 3
		this.model = options.model
		this.logger = options.logger ?? silentLogger

		const choice = selectVectorBackend(dimension, options.backend ?? "auto")
		this.backend = choice.backend
		this.backendName = choice.backend.name
		this.logger.debug("Vector backend selected", { backend: this.backendName, reason: choice.reason })
	}

	/** Exact number of stored vectors */
	get count(): number {
		return this.entries.length
	}

	/**
	 * Append vectors with their metadata. Nothing is stored unless the whole
	 * batch is valid.
	 */
	add(vectors: EmbeddingVector[], metadataList: M[], ids?: string[]): string[] {
		if (vectors.length !== metadataList.length) {
			throw new VectorIndexError(
				"length_mismatch",
				`Got ${vectors.length} vectors but ${metadataList.length} metadata records`,
			)
		}
		if (ids && ids.length !== vectors.length) {
			throw new VectorIndexError("length_mismatch", `Got ${vectors.length} vectors but ${ids.length} ids`)
		}

		for (const vector of vectors) {
			if (vector.length !== this.dimension) {
				throw new VectorIndexError(
					"dimension_mismatch",
					`Vector has dimension ${vector.length}, index expects ${this.dimension}`,
				)
			}
		}

		const assigned = ids ?? vectors.map(() => uuidv4())
		const batch = new Set<string>()
		for (const id of assigned) {
			if (this.ids.has(id) || batch.has(id)) {
				throw new VectorIndexError("duplicate_id", `Duplicate id: ${id}`, { id })
			}
			batch.add(id)
		}

		this.backend.add(vectors)
		assigned.forEach((id, i) => {
			this.entries.push({ id, metadata: metadataList[i] })
			this.ids.add(id)
		})

		return assigned
	}

	/**
	 * Ranked (metadata, score) list. With a predicate, a single pool of
	 * `k * overFetchMultiplier` candidates is filtered, so fewer than k hits may
	 * come back even when more matches exist further down.
	 */
	search(query: EmbeddingVector, k: number, predicate?: (metadata: M) => boolean): SearchHit<M>[] {
		return this.candidates(query, k, predicate).slice(0, k)
	}

	/**
	 * Every hit in the `k * overFetchMultiplier` pool that passes `predicate`,
	 * best first. Callers that re-score hits use this so the final cut to k
	 * happens after their ordering, not before it.
	 */
	candidates(query: EmbeddingVector, k: number, predicate?: (metadata: M) => boolean): SearchHit<M>[] {
		if (this.count === 0 || k <= 0) return []
		if (query.length !== this.dimension) {
			throw new VectorIndexError(
				"dimension_mismatch",
				`Query has dimension ${query.length}, index expects ${this.dimension}`,
			)
		}

		const poolSize = Math.min(k * this.overFetchMultiplier, this.count)
		const results: SearchHit<M>[] = []

		for (const hit of this.backend.search(query, poolSize)) {
			const entry = this.entries[hit.position]
			if (predicate && !predicate(entry.metadata)) continue
			results.push({ id: entry.id, metadata: entry.metadata, score: hit.score })
		}

		return results
	}

	/** All entries in insertion order */
	list(): Array<{ id: string; metadata: M }> {
		return this.entries.map((entry) => ({ id: entry.id, metadata: entry.metadata }))
	}

	clear(): void {
		this.backend.reset()
		this.entries = []
		this.ids.clear()
	}

	/**
	 * Write index.bin and metadata.json into `dir`.
	 */
	persist(dir: string): void {
		try {
			fs.mkdirSync(dir, { recursive: true })

			const vectors = this.backend.snapshot()
			const buffer = Buffer.alloc(HEADER_BYTES + vectors.length * 4)
			buffer.write(MAGIC, 0, "ascii")
			buffer.writeUInt32LE(FORMAT_VERSION, 4)
			buffer.writeUInt32LE(this.dimension, 8)
			buffer.writeUInt32LE(this.count, 12)
			for (let i = 0; i < vectors.length; i++) {
				buffer.writeFloatLE(vectors[i], HEADER_BYTES + i * 4)
			}

			const metadata = {
				version: FORMAT_VERSION,
				dimension: this.dimension,
				backend: this.backendName,
				model: this.model,
				documents: this.entries.map((entry) => ({ id: entry.id, ...this.codec.encode(entry.metadata) })),
			}

			writeAtomic(path.join(dir, INDEX_FILE), buffer)
			writeAtomic(path.join(dir, METADATA_FILE), JSON.stringify(metadata, null, 2))
		} catch (error) {
			throw new PersistenceError(`Failed to persist vector index to ${dir}: ${errorMessage(error)}`, { dir })
		}

		this.logger.debug("Vector index persisted", { dir, count: this.count })
	}

	/**
	 * Replace current state with the contents of `dir`.
	 *
	 * Returns false (and leaves the index empty) when either file is missing.
	 * A recorded dimension different from this index's is a VectorIndexError;
	 * unreadable or inconsistent files are a PersistenceError. Vectors past the
	 * last metadata document are dropped with a warning.
	 */
	load(dir: string): boolean {
		const indexPath = path.join(dir, INDEX_FILE)
		const metadataPath = path.join(dir, METADATA_FILE)

		if (!fs.existsSync(indexPath) || !fs.existsSync(metadataPath)) {
			this.clear()
			return false
		}

		let parsed: z.infer<typeof metadataFileSchema>
		let buffer: Buffer
		try {
			parsed = metadataFileSchema.parse(JSON.parse(fs.readFileSync(metadataPath, "utf-8")))
			buffer = fs.readFileSync(indexPath)
		} catch (error) {
			throw new PersistenceError(`Failed to read vector index from ${dir}: ${errorMessage(error)}`, { dir })
		}

		if (parsed.dimension !== this.dimension) {
			throw new VectorIndexError(
				"dimension_mismatch",
				`Persisted index has dimension ${parsed.dimension}, active embedding dimension is ${this.dimension}`,
				{ dir },
			)
		}

		let vectors = decodeIndexFile(buffer, this.dimension, dir)
		if (vectors.length < parsed.documents.length) {
			throw new PersistenceError(
				`Index file holds ${vectors.length} vectors but metadata lists ${parsed.documents.length} documents`,
				{ dir },
			)
		}
		if (vectors.length > parsed.documents.length) {
			// index.bin is renamed into place before metadata.json; trailing vectors are an unfinished write
			this.logger.warn("Index file has vectors without metadata, dropping them", {
				dir,
				vectors: vectors.length,
				documents: parsed.documents.length,
			})
			vectors = vectors.slice(0, parsed.documents.length)
		}

		let entries: Entry<M>[]
		try {
			entries = parsed.documents.map(({ id, ...rest }) => ({ id, metadata: this.codec.decode(rest) }))
		} catch (error) {
			throw new PersistenceError(`Invalid metadata record in ${metadataPath}: ${errorMessage(error)}`, { dir })
		}

		this.clear()
		this.backend.add(vectors)
		this.entries = entries
		for (const entry of entries) this.ids.add(entry.id)

		this.logger.debug("Vector index loaded", { dir, count: this.count })
		return true
	}
}

function decodeIndexFile(buffer: Buffer, dimension: number, dir: string): Float32Array[] {
	if (buffer.length < HEADER_BYTES || buffer.toString("ascii", 0, 4) !== MAGIC) {
		throw new PersistenceError(`${INDEX_FILE} is not a vector index file`, { dir })
	}
	const version = buffer.readUInt32LE(4)
	const fileDimension = buffer.readUInt32LE(8)
	const count = buffer.readUInt32LE(12)

	if (version !== FORMAT_VERSION) {
		throw new PersistenceError(`Unsupported index format version ${version}`, { dir })
	}
	if (fileDimension !== dimension) {
		throw new VectorIndexError(
			"dimension_mismatch",
			`${INDEX_FILE} has dimension ${fileDimension}, expected ${dimension}`,
			{ dir },
		)
	}
	if (buffer.length !== HEADER_BYTES + count * dimension * 4) {
		throw new PersistenceError(`${INDEX_FILE} is truncated or has trailing bytes`, { dir })
	}

	const vectors: Float32Array[] = []
	for (let n = 0; n < count; n++) {
		const vector = new Float32Array(dimension)
		const base = HEADER_BYTES + n * dimension * 4
		for (let i = 0; i < dimension; i++) vector[i] = buffer.readFloatLE(base + i * 4)
		vectors.push(vector)
	}
	return vectors
}

function writeAtomic(target: string, data: string | Buffer): void {
	const tmp = `${target}.${process.pid}.tmp`
	fs.writeFileSync(tmp, data)
	fs.renameSync(tmp, target)
}
