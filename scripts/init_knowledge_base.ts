#!/usr/bin/env npx tsx
/**
 * Knowledge Base Maintenance Script
 *
 * Seeds, inspects and queries the example store without a database.
 *
 * Usage:
 *   npx tsx scripts/init_knowledge_base.ts init [--reset] [--file=data/base_examples.json]
 *   npx tsx scripts/init_knowledge_base.ts status
 *   npx tsx scripts/init_knowledge_base.ts search "top selling products" [--tables=products,order_items] [--k=3]
 *
 * Settings (directory, embedding provider, dimension) come from config/config.yaml
 * and its environment overrides.
 */

import path from "path"
import { loadConfig } from "../src/config/loadConfig.js"
import { createEmbeddingProvider } from "../src/embeddings.js"
import { ExampleStore } from "../src/example_store.js"
import { createLogger } from "../src/logger.js"

// ============================================================================
// Configuration
// ============================================================================

interface Args {
	command: "init" | "status" | "search"
	text: string
	reset: boolean
	file: string | null
	tables: string[]
	k: number | null
}

function parseArgs(): Args {
	const [command, ...rest] = process.argv.slice(2)
	if (command !== "init" && command !== "status" && command !== "search") {
		console.error("Usage: init_knowledge_base.ts <init|status|search> [options]")
		process.exit(1)
	}

	const args: Args = { command, text: "", reset: false, file: null, tables: [], k: null }
	const words: string[] = []

	for (const arg of rest) {
		if (arg === "--reset") {
			args.reset = true
		} else if (arg.startsWith("--file=")) {
			args.file = arg.split("=")[1]
		} else if (arg.startsWith("--tables=")) {
			args.tables = arg.split("=")[1].split(",").map((t) => t.trim()).filter(Boolean)
		} else if (arg.startsWith("--k=")) {
			args.k = parseInt(arg.split("=")[1], 10)
		} else {
			words.push(arg)
		}
	}
	args.text = words.join(" ")

	if (args.command === "search" && !args.text) {
		console.error("Error: search needs query text")
		process.exit(1)
	}
	return args
}

// ============================================================================
// Main
// ============================================================================

async function main() {
	const args = parseArgs()
	const config = loadConfig()
	const logger = createLogger(config.logging.level)
	const dir = path.resolve(config.knowledge_base.dir)

	const store = new ExampleStore({
		embedder: createEmbeddingProvider(config),
		dir,
		backend: config.knowledge_base.backend,
		overFetchMultiplier: config.knowledge_base.over_fetch_multiplier,
		complexityPenalty: config.knowledge_base.complexity_penalty,
		logger,
	})

	if (args.command === "init" && args.reset) {
		store.clear()
	} else {
		store.load()
	}

	switch (args.command) {
		case "init": {
			const file = path.resolve(args.file ?? config.knowledge_base.seed_file)
			const added = await store.seedFromFile(file)
			store.persist()
			console.log(`Added ${added} examples from ${file}; knowledge base now holds ${store.count}`)
			break
		}
		case "status": {
			console.log(`Directory:  ${dir}`)
			console.log(`Examples:   ${store.count}`)
			console.log(`Dimension:  ${store.dimension}`)
			console.log(`Backend:    ${store.backend}`)
			console.log(`Embedding:  ${store.modelName}`)
			for (const example of store.list(10)) {
				console.log(`  [${example.complexity}] ${example.naturalQuery}`)
			}
			break
		}
		case "search": {
			const results = await store.retrieve({
				text: args.text,
				relevantTables: args.tables,
				k: args.k ?? config.knowledge_base.top_k,
			})
			if (results.length === 0) {
				console.log("No matching examples")
				break
			}
			results.forEach(({ example, score }, i) => {
				console.log(`${i + 1}. (${score.toFixed(4)}) ${example.naturalQuery}`)
				console.log(`   tables: ${example.tables.join(", ")}`)
				console.log(`   ${example.sql}`)
			})
			break
		}
	}
}

main().catch((error) => {
	console.error("Fatal error:", error)
	process.exit(1)
})
