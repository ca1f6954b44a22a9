/**
 * @askdb/core — barrel export
 *
 * Core logic used by the CLI: database access, tools, and the orchestration loop.
 */

// Database types
export type {
  ColumnDescription,
  ColumnInfo,
  Row,
  SchemaDescription,
  SchemaSnapshot,
  TableInfo,
} from './db/types.js';

// SQLite access
export { inspectSchema, toSchemaDescription, runSelect, testConnection, toJsonValue } from './db/sqlite.js';

// Static SQL checks
export { checkStatic, startsWithSelect, hasBalancedParentheses, FORBIDDEN_KEYWORDS } from './db/sql-check.js';
export type { StaticCheckResult, ForbiddenKeyword } from './db/sql-check.js';

// Configuration
export { loadConfig, loadModelConfig, DEFAULT_MAX_ROUNDS, DEFAULT_OPENAI_MODEL } from './config.js';
export type { AskdbConfig, ModelConfig, AzureModelConfig, OpenAIModelConfig } from './config.js';

// Errors
export { AskdbError, ConfigError, ToolNotFoundError, ToolArgumentsError, errorMessage } from './errors.js';

// LLM module
export type { ChatModel, ChatMessage, ChatReply, ChatRequest, ChatRole, ToolCall, ToolDefinition } from './llm/index.js';
export { OpenAIChatModel, createClient, parseToolArguments } from './llm/index.js';

// Structured response
export {
  createResponse,
  fallbackResponse,
  serializeResponse,
  parseResponse,
  countRows,
  NO_SQL,
} from './response.js';
export type { StructuredResponse } from './response.js';

// Tools
export {
  TOOL_NAMES,
  ToolRegistry,
  DEFAULT_TOOLS,
  discoverDatabaseSchema,
  generateSqlQuery,
  verifySqlQuery,
  executeSqlQuery,
  formatResponse,
} from './tools/index.js';
export type { Tool, ToolContext, ToolName } from './tools/index.js';

// Orchestration loop
export { Agent, isModelFailure, MODEL_FAILURE_PREFIX } from './agent.js';
export type { AgentOptions, AskOptions } from './agent.js';
