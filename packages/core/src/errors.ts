/**
 * Error types raised inside @askdb/core.
 *
 * Tools never let these escape: the orchestration loop turns every thrown
 * value into an `Error: ...` tool result so the model can react to it.
 */

export class AskdbError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ToolNotFoundError extends AskdbError {
  readonly toolName: string;

  constructor(toolName: string, available: readonly string[]) {
    super(`Unknown tool "${toolName}". Available tools: ${available.join(', ')}`);
    this.toolName = toolName;
  }
}

export class ToolArgumentsError extends AskdbError {
  readonly toolName: string;

  constructor(toolName: string, details: string) {
    super(`Invalid arguments for ${toolName}: ${details}`);
    this.toolName = toolName;
  }
}

export class ConfigError extends AskdbError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
