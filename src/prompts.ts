/**
 * Prompt templates for each workflow stage
 */

import type { ChatMessage } from "./llm_client.js"

export const CHAT_SYSTEM_PROMPT = `You are a helpful AI assistant. You can help with:
- General questions and conversations
- Explaining concepts
- Providing information

If the user asks about database queries or SQL, remind them that you can also help with:
- Converting natural language to SQL queries
- Explaining SQL statements
- Debugging SQL errors

Always respond in the same language as the user's input.`

export function buildIntentPrompt(userInput: string): string {
	return `You are an intent classification expert. Analyze user input and determine its intent type.

## Intent Types

1. **text_to_sql**: User wants to convert natural language to a SQL query
   - Examples: "Query all products with price greater than 100", "Count sales by category"

2. **sql_to_text**: User wants to understand the meaning of a SQL statement
   - Examples: "Explain this SQL: SELECT ...", "What does this query mean?"

3. **debug**: User wants to debug or fix problematic SQL
   - Examples: "This SQL has errors, please help", "Why does this query return no results?"

4. **chat**: General conversation, NOT related to databases or SQL
   - Examples: "Hello", "Tell me a joke", "Who are you?"

## Output Format

Respond with JSON only:
{"intent": "text_to_sql|sql_to_text|debug|chat", "confidence": 0.0-1.0, "reasoning": "why"}

## User Input

${userInput}`
}

export function buildTableSelectorPrompt(tablesInfo: string, userQuery: string): string {
	return `You are a database expert. Identify the tables relevant to the user's request.

## Available Tables

${tablesInfo}

## User Request

${userQuery}

## Task

Return the relevant table names as a comma-separated list. Return only table names, nothing else.

Example: users, orders, products`
}

export function buildTextToSqlPrompt(schema: string, examples: string, userQuery: string): string {
	const examplesBlock = examples ? `\n${examples}\n` : ""
	return `You are a professional SQL expert. Generate a correct PostgreSQL statement for the user's request using the database schema.

## Database Schema

${schema || "(schema unavailable)"}
${examplesBlock}
## User Request

${userQuery}

## Requirements

1. Only generate SELECT queries, no INSERT/UPDATE/DELETE
2. Use correct table and column names
3. Follow foreign keys for JOINs
4. Add appropriate WHERE conditions and ORDER BY
5. Return ONLY the SQL statement, no explanation

## SQL Statement`
}

export function buildSqlToTextPrompt(schema: string, sql: string): string {
	return `You are a SQL explanation expert. Explain this SQL statement in simple terms.

## Database Schema

${schema || "(schema unavailable)"}

## SQL Statement

${sql}

## Explanation Requirements

1. State the purpose of the query
2. Explain the tables and columns involved
3. Describe filter conditions and sorting
4. Use business language to describe the results

Respond in the same language as the user's request.

## Explanation`
}

export interface RepairPromptInput {
	schema: string
	sql: string
	error: string
	hint?: string
}

export function buildRepairPrompt(input: RepairPromptInput): string {
	const hintLine = input.hint ? `\nHint: ${input.hint}\n` : ""
	return `You are a SQL debugging expert. Fix the SQL statement based on the error message.

## Database Schema

${input.schema || "(schema unavailable)"}

## Original SQL

${input.sql}

## Error Message

${input.error}
${hintLine}
## Fix Requirements

1. Analyze the cause of the error
2. Fix the SQL statement
3. Return ONLY the fixed SQL statement

## Fixed SQL`
}

export function userTurn(content: string): ChatMessage[] {
	return [{ role: "user", content }]
}
