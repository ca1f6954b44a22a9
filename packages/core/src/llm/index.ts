/**
 * LLM module barrel export.
 */

export type { ChatMessage, ChatModel, ChatReply, ChatRequest, ChatRole, ToolCall, ToolDefinition, ToolParameters } from './types.js';
export { OpenAIChatModel, createClient, parseToolArguments, toWireMessage, toWireTool, fromWireToolCall } from './openai.js';
export { buildInitialMessages, buildSystemPrompt, buildSqlGenerationPrompt, buildVerificationPrompt, buildFormatPrompt, extractJson, stripCodeFences } from './prompt.js';
export { verificationVerdictSchema, structuredResponseWireSchema } from './schema_json.js';
export { validateVerdict, validateStructuredResponseWire, formatAjvErrors } from './validate.js';
export type { VerificationVerdict, StructuredResponseWire } from './validate.js';
