#!/usr/bin/env node
/**
 * Stdio entry point for the SQL agent MCP server
 *
 * Database settings come from config/config.yaml unless overridden.
 * Override priority:
 *   1. .mcp.json file in the project root (highest priority)
 *   2. CLI argument
 *   3. Environment variables
 *
 * Usage:
 *   node stdio.js '{"postgresConnectionString":"postgresql://...","role":"read"}'
 *
 * Or via environment variables:
 *   POSTGRES_CONNECTION_STRING=postgresql://... POSTGRES_ROLE=read node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { readFileSync, existsSync } from "fs"
import { join, dirname } from "path"
import { fileURLToPath } from "url"
import { createAgentContext } from "./agent_context.js"
import { errorMessage } from "./config.js"
import { loadConfig } from "./config/loadConfig.js"
import createServer, { applyRole, configSchema, type ServerOptions } from "./index.js"
import { createLogger, type Logger } from "./logger.js"

/**
 * Try to load options from .mcp.json in the project root
 */
function loadOptionsFromFile(logger: Logger): ServerOptions | null {
	const here = dirname(fileURLToPath(import.meta.url))
	// src/ when run through tsx, dist/src/ when built
	const candidates = [join(here, "..", ".mcp.json"), join(here, "..", "..", ".mcp.json")]

	for (const configPath of candidates) {
		if (!existsSync(configPath)) continue
		try {
			const validated = configSchema.parse(JSON.parse(readFileSync(configPath, "utf-8")))
			logger.info("Server options loaded", { from: configPath })
			return validated
		} catch (e) {
			logger.warn("Failed to load options from .mcp.json", { path: configPath, error: errorMessage(e) })
		}
	}
	return null
}

function resolveOptions(logger: Logger): ServerOptions {
	const fileOptions = loadOptionsFromFile(logger)
	if (fileOptions) return fileOptions

	const optionsArg = process.argv[2]
	if (optionsArg) {
		try {
			const validated = configSchema.parse(JSON.parse(optionsArg))
			logger.info("Server options loaded from CLI argument")
			return validated
		} catch (e) {
			logger.error("Failed to parse options from CLI argument", { error: errorMessage(e) })
			process.exit(1)
		}
	}

	return configSchema.parse({
		postgresConnectionString: process.env.POSTGRES_CONNECTION_STRING,
		role: process.env.POSTGRES_ROLE || undefined,
	})
}

async function main() {
	const baseConfig = loadConfig()
	const logger = createLogger(baseConfig.logging.level)
	const options = resolveOptions(logger)
	const config = applyRole(baseConfig, options)

	logger.info("Starting SQL agent MCP server with stdio transport")
	if (options.postgresConnectionString) {
		logger.info("Database", { connection: options.postgresConnectionString.replace(/:[^:@]+@/, ":***@") })
	} else {
		logger.info("Database", { host: config.database.host, port: config.database.port, name: config.database.name })
	}
	logger.info("Role", { role: options.role ?? "from config", read_only: config.execution.read_only })

	const context = await createAgentContext(config, {
		logger,
		connectionString: options.postgresConnectionString,
	})
	const server = createServer({ context })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("SQL agent MCP server running via stdio", { examples: context.store.count })

	const shutdown = () => {
		logger.info("Shutting down...")
		Promise.all([server.close(), context.close()])
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error("Shutdown failed", { error: errorMessage(error) })
				process.exit(1)
			})
	}
	process.on("SIGINT", shutdown)
	process.on("SIGTERM", shutdown)
}

main().catch((error) => {
	console.error("[ERROR] Fatal error:", error)
	process.exit(1)
})
