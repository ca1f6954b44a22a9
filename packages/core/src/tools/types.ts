/**
 * Tool contracts. Every tool takes string arguments and returns a single
 * string; failures are reported in that string, not thrown.
 */

import type { ChatModel, ToolDefinition } from '../llm/types.js';

export const TOOL_NAMES = [
  'discover_database_schema',
  'generate_sql_query',
  'verify_sql_query',
  'execute_sql_query',
  'format_response',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolContext {
  /** Model used by the generate, verify and format tools */
  model: ChatModel;
}

export interface Tool {
  readonly definition: ToolDefinition & { name: ToolName };
  run(args: Record<string, string>, ctx: ToolContext): Promise<string>;
}
