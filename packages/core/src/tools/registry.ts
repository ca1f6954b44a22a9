/**
 * Fixed catalog of tools offered to the orchestrating model, with argument
 * validation and dispatch by name.
 */

import type { ValidateFunction } from 'ajv';
import { ToolArgumentsError, ToolNotFoundError } from '../errors.js';
import type { ToolCall, ToolDefinition } from '../llm/types.js';
import { compileArgumentsValidator, formatAjvErrors } from '../llm/validate.js';
import { discoverSchemaTool } from './discover-schema.js';
import { executeSqlTool } from './execute-sql.js';
import { formatResponseTool } from './format-response.js';
import { generateSqlTool } from './generate-sql.js';
import type { Tool, ToolContext } from './types.js';
import { verifySqlTool } from './verify-sql.js';

export const DEFAULT_TOOLS: readonly Tool[] = [
  discoverSchemaTool,
  generateSqlTool,
  verifySqlTool,
  executeSqlTool,
  formatResponseTool,
];

interface RegisteredTool {
  tool: Tool;
  validate: ValidateFunction<Record<string, string>>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: readonly Tool[] = DEFAULT_TOOLS) {
    for (const tool of tools) {
      this.tools.set(tool.definition.name, {
        tool,
        validate: compileArgumentsValidator(tool.definition.parameters),
      });
    }
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map(({ tool }) => tool.definition);
  }

  /**
   * Run one tool call. Throws ToolNotFoundError / ToolArgumentsError for
   * calls that cannot be dispatched; the loop reports those to the model.
   */
  async dispatch(call: ToolCall, ctx: ToolContext): Promise<string> {
    const entry = this.tools.get(call.name);
    if (!entry) {
      throw new ToolNotFoundError(call.name, this.names());
    }
    if (!entry.validate(call.arguments)) {
      throw new ToolArgumentsError(call.name, formatAjvErrors(entry.validate.errors));
    }
    return entry.tool.run(call.arguments, ctx);
  }
}
