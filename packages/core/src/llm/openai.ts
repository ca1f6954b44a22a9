/**
 * OpenAI / Azure OpenAI implementation of ChatModel.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type { ModelConfig } from '../config.js';
import type { ChatMessage, ChatModel, ChatReply, ChatRequest, ToolCall, ToolDefinition } from './types.js';

type WireMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type WireTool = OpenAI.Chat.Completions.ChatCompletionTool;
type WireToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;

/**
 * Decode the JSON argument string of a tool call. Non-string values are
 * re-encoded as JSON text; anything that is not a JSON object yields `{}`,
 * which later fails argument validation with a readable message.
 */
export function parseToolArguments(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }
  const args: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    args[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return args;
}

export function toWireMessage(message: ChatMessage): WireMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: 'assistant', content: message.content ?? '' };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

export function toWireTool(tool: ToolDefinition): WireTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  };
}

export function fromWireToolCall(call: WireToolCall): ToolCall {
  return {
    id: call.id,
    name: call.function.name,
    arguments: parseToolArguments(call.function.arguments),
  };
}

export function createClient(config: ModelConfig): OpenAI {
  if (config.provider === 'azure') {
    return new AzureOpenAI({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      apiVersion: config.apiVersion,
      deployment: config.model,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
  }
  return new OpenAI({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
}

export class OpenAIChatModel implements ChatModel {
  readonly model: string;
  private client: OpenAI;

  constructor(config: ModelConfig, client: OpenAI = createClient(config)) {
    this.model = config.model;
    this.client = client;
  }

  async chat(request: ChatRequest): Promise<ChatReply> {
    const tools = request.tools?.map(toWireTool);
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: request.messages.map(toWireMessage),
      ...(tools && tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const message = response.choices[0]?.message;
    if (!message) {
      throw new Error('OpenAI returned no choices.');
    }
    return {
      content: message.content,
      toolCalls: (message.tool_calls ?? []).map(fromWireToolCall),
    };
  }
}
