/**
 * Chat model types. The orchestration loop and the tools only see these;
 * the SDK wire shapes stay inside openai.ts.
 */

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, string>;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

export type ChatRole = ChatMessage['role'];

/** JSON schema for a tool's arguments: string properties only. */
export interface ToolParameters {
  type: 'object';
  properties: Record<string, { type: 'string'; description: string }>;
  required: string[];
  additionalProperties?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  temperature?: number;
  maxTokens?: number;
  /** Constrain the reply to a single JSON object */
  json?: boolean;
}

export interface ChatReply {
  content: string | null;
  toolCalls: ToolCall[];
}

export interface ChatModel {
  readonly model: string;
  chat(request: ChatRequest): Promise<ChatReply>;
}
