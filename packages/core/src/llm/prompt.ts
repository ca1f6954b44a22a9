/**
 * Prompt construction for the orchestrator and the model-backed tools.
 */

import type { ChatMessage } from './types.js';

const RAW_ROWS_RULE = `Your SQL queries must ALWAYS return actual rows (SELECT * FROM table WHERE conditions),
NEVER use COUNT(*), SUM(), AVG() or other aggregations. The user wants to see the actual data.`;

export function buildSystemPrompt(toolNames: readonly string[]): string {
  return `You are an NL2SQL assistant that answers questions about a SQLite database.

You have access to these tools:
${toolNames.map((name) => `- ${name}`).join('\n')}

CRITICAL RULE: ${RAW_ROWS_RULE}

You decide which tools to use and when:
1. Work out what information you need
2. Discover the schema before generating SQL
3. Generate SQL that returns raw data rows (never aggregated)
4. Verify the SQL; if verification fails because it expects COUNT(*), regenerate with SELECT * instead
5. Execute the query; if execution fails, fix the query and try again
6. Call format_response with the results

Always end by calling format_response to produce the final structured response.`;
}

export function buildInitialMessages(question: string, databasePath: string, toolNames: readonly string[]): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(toolNames) },
    { role: 'user', content: `Database: ${databasePath}\nQuestion: ${question}` },
  ];
}

export function buildSqlGenerationPrompt(question: string, schemaInfo: string): string {
  return `You are a SQL expert. Generate a SQLite query for this question.

Database Schema:
${schemaInfo}

Question: ${question}

CRITICAL REQUIREMENTS:
1. NEVER use COUNT(*), SUM(), AVG(), or other aggregation functions
2. ALWAYS return SELECT * FROM table WHERE conditions to show actual rows
3. For "how many" questions, return the matching rows so they can be counted
4. For "average" questions, return the individual rows behind the average
5. Example: for "how many survived", use SELECT * FROM table WHERE Survived = 1 (NOT SELECT COUNT(*))

Return only the SQL query - no explanations or formatting.`;
}

export function buildVerificationPrompt(sql: string, schemaInfo: string, question: string): string {
  return `Verify this SQL query for correctness and relevance to the question.

Database Schema:
${schemaInfo}

Question: ${question}
SQL Query: ${sql}

IMPORTANT: The query should return actual rows, NOT aggregated results.
For "how many" questions, SELECT * is CORRECT because the rows themselves are the answer.

Check:
1. Does the query use valid table/column names from the schema?
2. Is the query logically correct for answering the question?
3. Are there any obvious syntax errors?
4. ACCEPT queries that return rows instead of using COUNT(*) - this is the preferred approach

Return JSON with:
{
  "valid": true or false,
  "issues": ["list of any issues found"],
  "suggestions": ["list of suggestions for improvement"]
}`;
}

export function buildFormatPrompt(question: string, sql: string, results: string): string {
  return `Convert these query results into a natural, conversational response.

Original Question: ${question}
SQL Query: ${sql}
Results: ${results}

Provide a clear, helpful answer in natural language that explains the results.`;
}

/**
 * Strip a surrounding markdown code fence (```sql ... ```) from model output.
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```(?:sql)?\n?/gi, '').trim();
}

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}
