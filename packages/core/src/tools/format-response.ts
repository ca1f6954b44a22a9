import { errorMessage } from '../errors.js';
import { buildFormatPrompt } from '../llm/prompt.js';
import type { ChatModel } from '../llm/types.js';
import { createResponse, fallbackResponse, parseResults, serializeResponse } from '../response.js';
import type { Tool } from './types.js';

/**
 * Narrate the rows and wrap them into a serialized StructuredResponse.
 * Always returns a well-formed response, even when the model call fails.
 */
export async function formatResponse(
  model: ChatModel,
  question: string,
  sql: string,
  results: string,
): Promise<string> {
  try {
    const reply = await model.chat({
      messages: [{ role: 'user', content: buildFormatPrompt(question, sql, results) }],
      temperature: 0.3,
      maxTokens: 400,
    });
    const answer = (reply.content ?? '').trim();
    const { rows, rowCount } = parseResults(results);
    return serializeResponse(createResponse({ answer, sql, rows, rowCount }));
  } catch (err: unknown) {
    return serializeResponse(fallbackResponse(`Error formatting response: ${errorMessage(err)}`, sql));
  }
}

export const formatResponseTool: Tool = {
  definition: {
    name: 'format_response',
    description: 'Format results into natural language',
    parameters: {
      type: 'object',
      properties: {
        question: { type: 'string', description: 'Original question' },
        sql_query: { type: 'string', description: 'SQL query used' },
        results: { type: 'string', description: 'Query results' },
      },
      required: ['question', 'sql_query', 'results'],
    },
  },
  run: (args, ctx) => formatResponse(ctx.model, args.question, args.sql_query, args.results),
};
