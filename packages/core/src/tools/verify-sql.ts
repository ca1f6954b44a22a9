/**
 * Two-stage verification: static checks first, then a model judgment.
 * The result is advice for the orchestrating model; nothing blocks execution
 * on it.
 */

import { checkStatic } from '../db/sql-check.js';
import { errorMessage } from '../errors.js';
import { buildVerificationPrompt, extractJson } from '../llm/prompt.js';
import type { ChatModel } from '../llm/types.js';
import { formatAjvErrors, validateVerdict, type VerificationVerdict } from '../llm/validate.js';
import type { Tool } from './types.js';

export const VERIFIED_MESSAGE = 'Query verified successfully.';

export function describeVerdict(verdict: VerificationVerdict): string {
  if (verdict.valid) {
    return VERIFIED_MESSAGE;
  }
  const issues = verdict.issues && verdict.issues.length > 0 ? verdict.issues : ['Unknown validation error'];
  let text = `Query validation failed: ${issues.join(', ')}`;
  if (verdict.suggestions && verdict.suggestions.length > 0) {
    text += `. Suggestions: ${verdict.suggestions.join('; ')}`;
  }
  return text;
}

export async function verifySqlQuery(
  model: ChatModel,
  sql: string,
  schemaInfo: string,
  question: string,
): Promise<string> {
  const staticResult = checkStatic(sql);
  if (!staticResult.safe) {
    return `Error: ${staticResult.reason}`;
  }

  try {
    const reply = await model.chat({
      messages: [{ role: 'user', content: buildVerificationPrompt(sql, schemaInfo, question) }],
      temperature: 0.1,
      maxTokens: 300,
      json: true,
    });
    const parsed: unknown = JSON.parse(extractJson(reply.content ?? ''));
    if (!validateVerdict(parsed)) {
      throw new Error(`unexpected judgment format (${formatAjvErrors(validateVerdict.errors)})`);
    }
    return describeVerdict(parsed);
  } catch (err: unknown) {
    return `Error verifying query: ${errorMessage(err)}`;
  }
}

export const verifySqlTool: Tool = {
  definition: {
    name: 'verify_sql_query',
    description: 'Verify SQL query for correctness and safety',
    parameters: {
      type: 'object',
      properties: {
        sql_query: { type: 'string', description: 'SQL query to verify' },
        schema_info: { type: 'string', description: 'Database schema information' },
        question: { type: 'string', description: 'Original natural language question' },
      },
      required: ['sql_query', 'schema_info', 'question'],
    },
  },
  run: (args, ctx) => verifySqlQuery(ctx.model, args.sql_query, args.schema_info, args.question),
};
