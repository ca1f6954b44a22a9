/**
 * SQL synthesis. The raw-rows policy (no aggregates) lives in the prompt
 * only; nothing downstream checks it structurally.
 */

import { errorMessage } from '../errors.js';
import { buildSqlGenerationPrompt, stripCodeFences } from '../llm/prompt.js';
import type { ChatModel } from '../llm/types.js';
import type { Tool } from './types.js';

export async function generateSqlQuery(model: ChatModel, question: string, schemaInfo: string): Promise<string> {
  try {
    const reply = await model.chat({
      messages: [{ role: 'user', content: buildSqlGenerationPrompt(question, schemaInfo) }],
      temperature: 0.1,
      maxTokens: 300,
    });
    const sql = stripCodeFences(reply.content ?? '');
    if (!sql) {
      throw new Error('model returned an empty statement');
    }
    return sql;
  } catch (err: unknown) {
    return `Error generating SQL: ${errorMessage(err)}`;
  }
}

export const generateSqlTool: Tool = {
  definition: {
    name: 'generate_sql_query',
    description: 'Generate SQL query from natural language',
    parameters: {
      type: 'object',
      properties: {
        question: { type: 'string', description: 'Natural language question' },
        schema_info: { type: 'string', description: 'Database schema information' },
      },
      required: ['question', 'schema_info'],
    },
  },
  run: (args, ctx) => generateSqlQuery(ctx.model, args.question, args.schema_info),
};
