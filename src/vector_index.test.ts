import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { PersistenceError, VectorIndexError } from "./config.js"
import { normalize } from "./embeddings.js"
import { createLogger } from "./logger.js"
import {
	FlatInnerProductBackend,
	INDEX_FILE,
	METADATA_FILE,
	VectorIndex,
	selectVectorBackend,
	type MetadataCodec,
} from "./vector_index.js"

interface Doc {
	label: string
	ok: boolean
}

const codec: MetadataCodec<Doc> = {
	encode: (doc) => ({ label: doc.label, ok: doc.ok }),
	decode: (raw) => ({ label: String(raw.label), ok: raw.ok === true }),
}

const vec = (...values: number[]) => normalize(Float32Array.from(values))
const doc = (label: string, ok: boolean = true): Doc => ({ label, ok })

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

let tmpDir: string

beforeEach(() => {
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "vector-index-test-"))
})

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true })
})

describe("selectVectorBackend", () => {
	it("resolves auto to the flat backend with a reason", () => {
		const choice = selectVectorBackend(3, "auto")
		expect(choice.backend.name).toBe("flat")
		expect(choice.reason).toBe("no accelerated backend available; using exact flat search")
	})

	it("honours an explicit flat preference", () => {
		expect(selectVectorBackend(3, "flat").reason).toBe("flat backend requested")
	})
})

describe("FlatInnerProductBackend", () => {
	it("grows past its initial capacity", () => {
		const backend = new FlatInnerProductBackend(2, 1)
		backend.add([vec(1, 0), vec(0, 1), vec(1, 1)])
		expect(backend.size).toBe(3)
		expect(backend.snapshot()).toHaveLength(6)
		expect(backend.search(vec(0, 1), 1)).toEqual([{ position: 1, score: 1 }])
	})
})

describe("VectorIndex.add", () => {
	it("assigns uuid v4 ids and counts entries", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		const ids = index.add([vec(1, 0, 0), vec(0, 1, 0)], [doc("a"), doc("b")])
		expect(ids).toHaveLength(2)
		for (const id of ids) expect(id).toMatch(UUID_RE)
		expect(index.count).toBe(2)
	})

	it("keeps explicit ids", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		expect(index.add([vec(1, 0, 0)], [doc("a")], ["doc-1"])).toEqual(["doc-1"])
		expect(index.list()).toEqual([{ id: "doc-1", metadata: doc("a") }])
	})

	it("rejects vectors and metadata of different lengths", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		try {
			index.add([vec(1, 0, 0)], [doc("a"), doc("b")])
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(VectorIndexError)
			if (error instanceof VectorIndexError) expect(error.kind).toBe("length_mismatch")
		}
	})

	it("rejects a vector of the wrong dimension", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		expect(() => index.add([vec(1, 0)], [doc("a")])).toThrow("Vector has dimension 2, index expects 3")
	})

	it("rejects duplicate ids without storing any of the batch", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		index.add([vec(1, 0, 0)], [doc("a")], ["x"])

		expect(() => index.add([vec(0, 1, 0), vec(0, 0, 1)], [doc("b"), doc("c")], ["y", "x"])).toThrow(
			"Duplicate id: x",
		)
		expect(() => index.add([vec(0, 1, 0), vec(0, 0, 1)], [doc("b"), doc("c")], ["z", "z"])).toThrow(
			"Duplicate id: z",
		)
		expect(index.count).toBe(1)
	})
})

describe("VectorIndex.search", () => {
	it("returns an empty list for an empty index", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		expect(index.search(vec(1, 0, 0), 5)).toEqual([])
	})

	it("ranks by inner product, highest first", () => {
		const index = new VectorIndex<Doc>(3, { codec })
		index.add([vec(1, 0, 0), vec(0, 1, 0), vec(0.6, 0.8, 0)], [doc("a"), doc("b"), doc("c")], ["a", "b", "c"])

		const hits = index.search(vec(1, 0, 0), 3)
		expect(hits.map((h) => h.id)).toEqual(["a", "c", "b"])
		expect(hits[0].score).toBeCloseTo(1, 6)
		expect(hits[1].score).toBeCloseTo(0.6, 6)
		expect(hits[2].score).toBeCloseTo(0, 6)
	})

	it("filters with a predicate inside a pool of 3k candidates", () => {
		const index = new VectorIndex<Doc>(2, { codec })
		// Seven docs at decreasing similarity to (1, 0); only the last passes the filter
		const vectors = [0, 1, 2, 3, 4, 5, 6].map((i) => vec(10 - i, i))
		const docs = vectors.map((_, i) => doc(`d${i}`, i === 6))
		index.add(vectors, docs)

		// k=2 -> pool of 6, which misses d6
		expect(index.search(vec(1, 0), 2, (d) => d.ok)).toEqual([])
		// k=3 -> pool of 9 (capped at 7), which reaches d6
		expect(index.search(vec(1, 0), 3, (d) => d.ok).map((h) => h.metadata.label)).toEqual(["d6"])
	})

	it("stops at k matches", () => {
		const index = new VectorIndex<Doc>(2, { codec })
		index.add([vec(1, 0), vec(1, 1), vec(0, 1)], [doc("a"), doc("b"), doc("c")])
		expect(index.search(vec(1, 0), 2, () => true).map((h) => h.metadata.label)).toEqual(["a", "b"])
	})
})

describe("VectorIndex.candidates", () => {
	it("returns every filtered hit in the pool without cutting to k", () => {
		const index = new VectorIndex<Doc>(2, { codec })
		const vectors = [0, 1, 2, 3, 4, 5, 6].map((i) => vec(10 - i, i))
		index.add(
			vectors,
			vectors.map((_, i) => doc(`d${i}`, i % 2 === 0)),
		)

		// k=1 -> pool of 3 (d0, d1, d2)
		expect(index.candidates(vec(1, 0), 1).map((h) => h.metadata.label)).toEqual(["d0", "d1", "d2"])
		expect(index.candidates(vec(1, 0), 1, (d) => d.ok).map((h) => h.metadata.label)).toEqual(["d0", "d2"])
		expect(index.search(vec(1, 0), 1, (d) => d.ok).map((h) => h.metadata.label)).toEqual(["d0"])
	})
})

describe("VectorIndex persistence", () => {
	function populated(): VectorIndex<Doc> {
		const index = new VectorIndex<Doc>(3, { codec, model: "test-model" })
		index.add([vec(1, 0, 0), vec(0, 1, 0), vec(1, 1, 1)], [doc("a"), doc("b", false), doc("c")])
		return index
	}

	it("round-trips count, metadata and ranking", () => {
		const original = populated()
		original.persist(tmpDir)

		const restored = new VectorIndex<Doc>(3, { codec })
		expect(restored.load(tmpDir)).toBe(true)
		expect(restored.count).toBe(3)
		expect(restored.list()).toEqual(original.list())

		const query = vec(0.2, 0.9, 0.1)
		expect(restored.search(query, 3)).toEqual(original.search(query, 3))
	})

	it("writes the binary header and a metadata document list", () => {
		populated().persist(tmpDir)

		const bin = fs.readFileSync(path.join(tmpDir, INDEX_FILE))
		expect(bin.toString("ascii", 0, 4)).toBe("SQLV")
		expect(bin.readUInt32LE(4)).toBe(1)
		expect(bin.readUInt32LE(8)).toBe(3)
		expect(bin.readUInt32LE(12)).toBe(3)
		expect(bin.length).toBe(16 + 3 * 3 * 4)

		const meta = JSON.parse(fs.readFileSync(path.join(tmpDir, METADATA_FILE), "utf-8"))
		expect(meta.dimension).toBe(3)
		expect(meta.backend).toBe("flat")
		expect(meta.model).toBe("test-model")
		expect(meta.documents.map((d: { label: string }) => d.label)).toEqual(["a", "b", "c"])
	})

	it("leaves no temp files behind", () => {
		populated().persist(tmpDir)
		expect(fs.readdirSync(tmpDir).sort()).toEqual([INDEX_FILE, METADATA_FILE])
	})

	it("starts empty when the files are missing", () => {
		const index = populated()
		expect(index.load(path.join(tmpDir, "nowhere"))).toBe(false)
		expect(index.count).toBe(0)
	})

	it("fails loudly on a dimension mismatch", () => {
		populated().persist(tmpDir)
		const other = new VectorIndex<Doc>(4, { codec })
		expect(() => other.load(tmpDir)).toThrow(VectorIndexError)
	})

	it("drops vectors written after the last metadata save", () => {
		const index = populated()
		index.persist(tmpDir)
		const savedMetadata = fs.readFileSync(path.join(tmpDir, METADATA_FILE))

		// index.bin replaced, then the process dies before metadata.json is renamed
		index.add([vec(0, 0, 1)], [doc("d")])
		index.persist(tmpDir)
		fs.writeFileSync(path.join(tmpDir, METADATA_FILE), savedMetadata)

		const lines: string[] = []
		const restored = new VectorIndex<Doc>(3, { codec, logger: createLogger("warn", (line) => lines.push(line)) })

		expect(restored.load(tmpDir)).toBe(true)
		expect(restored.count).toBe(3)
		expect(restored.list().map((e) => e.metadata.label)).toEqual(["a", "b", "c"])
		expect(restored.search(vec(0, 0, 1), 1).map((h) => h.metadata.label)).toEqual(["c"])
		expect(lines).toEqual([
			`[WARN] Index file has vectors without metadata, dropping them {"dir":${JSON.stringify(tmpDir)},"vectors":4,"documents":3}`,
		])
	})

	it("rejects metadata listing more documents than the index holds", () => {
		populated().persist(tmpDir)
		const metaPath = path.join(tmpDir, METADATA_FILE)
		const meta = JSON.parse(fs.readFileSync(metaPath, "utf-8"))
		meta.documents.push({ ...meta.documents[0], id: "extra" })
		fs.writeFileSync(metaPath, JSON.stringify(meta))

		const index = new VectorIndex<Doc>(3, { codec })
		expect(() => index.load(tmpDir)).toThrow(PersistenceError)
		expect(() => index.load(tmpDir)).toThrow("Index file holds 3 vectors but metadata lists 4 documents")
	})

	it("rejects a metadata file that is not JSON", () => {
		populated().persist(tmpDir)
		fs.writeFileSync(path.join(tmpDir, METADATA_FILE), "not json")
		expect(() => new VectorIndex<Doc>(3, { codec }).load(tmpDir)).toThrow(PersistenceError)
	})

	it("keeps ids unique across a reload", () => {
		populated().persist(tmpDir)
		const index = new VectorIndex<Doc>(3, { codec })
		index.load(tmpDir)
		const [firstId] = index.list().map((e) => e.id)
		expect(() => index.add([vec(1, 0, 0)], [doc("dup")], [firstId])).toThrow(VectorIndexError)
	})
})
