/**
 * Agent context: every long-lived collaborator a request needs, built once
 * per process and passed explicitly to the workflow engine and tools.
 */

import * as fs from "fs"
import * as path from "path"
import type { Pool } from "pg"
import type { SqlAgentConfig } from "./config/loadConfig.js"
import { createEmbeddingProvider } from "./embeddings.js"
import { ExampleStore } from "./example_store.js"
import { FeedbackRecorder } from "./feedback_recorder.js"
import { createLLMClient, type LLMClient } from "./llm_client.js"
import { createLogger, type Logger } from "./logger.js"
import { PostgresSchemaIntrospector, type SchemaProvider } from "./schema_introspector.js"
import { PostgresSandbox, createPool, type SqlSandbox } from "./sql_executor.js"

export interface AgentContext {
	config: SqlAgentConfig
	logger: Logger
	llm: LLMClient
	schema: SchemaProvider
	sandbox: SqlSandbox
	store: ExampleStore
	feedback: FeedbackRecorder
}

export interface AgentRuntime extends AgentContext {
	close(): Promise<void>
}

export interface CreateAgentContextOptions {
	logger?: Logger
	/** Overrides the `database` config section */
	connectionString?: string
	pool?: Pool
}

/**
 * Open the knowledge base from its directory, falling back to the seed file
 * when it is empty. A persisted index whose dimension disagrees with the
 * active embedder is an error.
 */
export async function openExampleStore(config: SqlAgentConfig, logger: Logger): Promise<ExampleStore> {
	const kb = config.knowledge_base
	const dir = path.resolve(kb.dir)
	const store = new ExampleStore({
		embedder: createEmbeddingProvider(config),
		dir,
		backend: kb.backend,
		overFetchMultiplier: kb.over_fetch_multiplier,
		complexityPenalty: kb.complexity_penalty,
		logger,
	})

	store.load()

	if (store.count === 0) {
		const seedFile = path.resolve(kb.seed_file)
		if (fs.existsSync(seedFile)) {
			const added = await store.seedFromFile(seedFile)
			store.persist()
			logger.info("Knowledge base seeded", { file: seedFile, added })
		} else {
			logger.info("Knowledge base empty and no seed file found", { file: seedFile })
		}
	}

	return store
}

export async function createAgentContext(
	config: SqlAgentConfig,
	options: CreateAgentContextOptions = {},
): Promise<AgentRuntime> {
	const logger = options.logger ?? createLogger(config.logging.level)
	const pool = options.pool ?? createPool(config, options.connectionString)
	const ownsPool = !options.pool

	const store = await openExampleStore(config, logger)

	return {
		config,
		logger,
		llm: createLLMClient(config),
		schema: new PostgresSchemaIntrospector(pool, { logger }),
		sandbox: new PostgresSandbox(pool, {
			readOnly: config.execution.read_only,
			maxRows: config.execution.max_rows,
			logger,
		}),
		store,
		feedback: new FeedbackRecorder(store, { persistDir: path.resolve(config.knowledge_base.dir), logger }),
		async close() {
			if (ownsPool) await pool.end()
		},
	}
}
