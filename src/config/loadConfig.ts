/**
 * Unified config loader for the SQL agent.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged object is validated by `configSchema`, which also fills every
 * default, so a missing config directory still yields a complete config.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

export const INTENTS = ["text_to_sql", "sql_to_text", "debug", "chat"] as const
export type Intent = (typeof INTENTS)[number]

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("shop"),
	user: z.string().default("sql_agent"),
	password: z.string().default(""),
})

const modelSchema = z.object({
	llm: z.string().default("qwen2.5-coder:7b"),
	provider: z.literal("ollama").default("ollama"),
	ollama_url: z.string().default("http://localhost:11434"),
	timeout: z.number().int().positive().default(60000),
	temperature: z.number().min(0).max(2).default(0.1),
})

const embeddingSchema = z.object({
	provider: z.enum(["hash", "ollama"]).default("hash"),
	model: z.string().default("nomic-embed-text:latest"),
	dimension: z.number().int().positive().default(384),
})

const knowledgeBaseSchema = z.object({
	dir: z.string().default("data/knowledge_base"),
	top_k: z.number().int().positive().default(3),
	over_fetch_multiplier: z.number().int().positive().default(3),
	complexity_penalty: z.number().min(0).default(0.1),
	backend: z.enum(["auto", "flat"]).default("auto"),
	seed_file: z.string().default("data/base_examples.json"),
})

const workflowSchema = z.object({
	max_retries: z.number().int().min(0).default(3),
	default_intent: z.enum(INTENTS).default("chat"),
	fast_path_confidence: z.number().min(0).max(1).default(0.9),
	max_relevant_tables: z.number().int().positive().default(10),
	schema_table_limit: z.number().int().positive().default(20),
})

const executionSchema = z.object({
	timeout_ms: z.number().int().positive().default(30000),
	max_rows: z.number().int().positive().default(100),
	read_only: z.boolean().default(true),
})

const loggingSchema = z.object({
	level: z.enum(["debug", "info", "warn", "error"]).default("info"),
})

export const configSchema = z.object({
	database: databaseSchema.default({}),
	model: modelSchema.default({}),
	embedding: embeddingSchema.default({}),
	knowledge_base: knowledgeBaseSchema.default({}),
	workflow: workflowSchema.default({}),
	execution: executionSchema.default({}),
	logging: loggingSchema.default({}),
})

export type SqlAgentConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type RawConfig = Record<string, unknown>

function isPlainObject(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

export function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(right) && isPlainObject(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: RawConfig, name: string): RawConfig {
	const existing = cfg[name]
	if (isPlainObject(existing)) return existing
	const created: RawConfig = {}
	cfg[name] = created
	return created
}

function set(target: RawConfig, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: RawConfig): void {
	const db = section(cfg, "database")
	set(db, "host", env("DB_HOST"))
	set(db, "port", envInt("DB_PORT"))
	set(db, "name", env("DB_NAME"))
	set(db, "user", env("DB_USER"))
	set(db, "password", env("DB_PASSWORD"))

	const m = section(cfg, "model")
	set(m, "llm", env("OLLAMA_MODEL"))
	set(m, "ollama_url", env("OLLAMA_BASE_URL"))
	set(m, "timeout", envInt("OLLAMA_TIMEOUT"))
	set(m, "temperature", envFloat("TEMPERATURE"))

	const e = section(cfg, "embedding")
	set(e, "provider", env("EMBEDDING_PROVIDER"))
	set(e, "model", env("EMBEDDING_MODEL"))
	set(e, "dimension", envInt("EMBEDDING_DIMENSION"))

	const kb = section(cfg, "knowledge_base")
	set(kb, "dir", env("KNOWLEDGE_BASE_DIR"))
	set(kb, "top_k", envInt("RAG_TOP_K"))
	set(kb, "backend", env("VECTOR_BACKEND"))

	const w = section(cfg, "workflow")
	set(w, "max_retries", envInt("MAX_RETRIES"))
	set(w, "default_intent", env("DEFAULT_INTENT"))

	const x = section(cfg, "execution")
	set(x, "timeout_ms", envInt("EXECUTION_TIMEOUT_MS"))
	set(x, "max_rows", envInt("MAX_ROWS"))
	set(x, "read_only", envBool("EXECUTION_READ_ONLY"))

	const l = section(cfg, "logging")
	set(l, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: SqlAgentConfig | null = null

export function loadConfig(): SqlAgentConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = configSchema.parse(merged)
	return _config
}

export function getConfig(): SqlAgentConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
