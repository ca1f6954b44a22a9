/**
 * Orchestration loop.
 *
 * The orchestrating model picks tool calls round by round; every call is
 * dispatched in order and its result appended to the conversation. The loop
 * ends when the model answers without tool calls or the round budget runs
 * out. Whatever happens, the caller gets a StructuredResponse.
 */

import { performance } from 'node:perf_hooks';
import { DEFAULT_MAX_ROUNDS } from './config.js';
import { errorMessage } from './errors.js';
import { buildInitialMessages } from './llm/prompt.js';
import type { ChatMessage, ChatModel, ChatReply, ToolCall } from './llm/types.js';
import { NO_SQL, fallbackResponse, parseResponse, type StructuredResponse } from './response.js';
import { ToolRegistry } from './tools/registry.js';
import type { ToolContext } from './tools/types.js';

const RESULT_PREVIEW_CHARS = 200;

export const MODEL_FAILURE_PREFIX = 'Error contacting the language model: ';

export interface AgentOptions {
  /** Model that drives tool selection */
  model: ChatModel;
  /** Model used inside the generate/verify/format tools; defaults to `model` */
  toolModel?: ChatModel;
  registry?: ToolRegistry;
  maxRounds?: number;
  verbose?: boolean;
  /** Sink for verbose trace lines; defaults to console.log */
  log?: (line: string) => void;
}

export interface AskOptions {
  maxRounds?: number;
  verbose?: boolean;
}

interface ToolOutcome {
  content: string;
  /** False when the call never reached a tool (unknown name, bad arguments, throw) */
  ran: boolean;
}

/**
 * True for the fallback returned when the orchestrating model could not be
 * reached and nothing had been formatted yet.
 */
export function isModelFailure(response: StructuredResponse): boolean {
  return response.sql === NO_SQL && response.rowCount === 0 && response.answer.startsWith(MODEL_FAILURE_PREFIX);
}

function preview(text: string): string {
  return text.length > RESULT_PREVIEW_CHARS ? `${text.slice(0, RESULT_PREVIEW_CHARS)}...` : text;
}

export class Agent {
  private readonly model: ChatModel;
  private readonly toolModel: ChatModel;
  private readonly registry: ToolRegistry;
  private readonly maxRounds: number;
  private readonly verbose: boolean;
  private readonly log: (line: string) => void;

  constructor(options: AgentOptions) {
    this.model = options.model;
    this.toolModel = options.toolModel ?? options.model;
    this.registry = options.registry ?? new ToolRegistry();
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.verbose = options.verbose ?? false;
    this.log = options.log ?? ((line) => console.log(line));
  }

  async ask(question: string, databasePath: string, options: AskOptions = {}): Promise<StructuredResponse> {
    const maxRounds = options.maxRounds ?? this.maxRounds;
    const verbose = options.verbose ?? this.verbose;
    const trace = (line: string): void => {
      if (verbose) this.log(line);
    };

    const messages: ChatMessage[] = buildInitialMessages(question, databasePath, this.registry.names());
    const tools = this.registry.definitions();
    const ctx: ToolContext = { model: this.toolModel };
    let captured: StructuredResponse | null = null;
    let toolCallCount = 0;

    trace(`Question: ${question}`);
    trace(`Database: ${databasePath}`);

    for (let round = 1; round <= maxRounds; round++) {
      trace(`Round ${round}/${maxRounds}`);

      let reply: ChatReply;
      try {
        reply = await this.model.chat({ messages, tools, temperature: 0.1 });
      } catch (err: unknown) {
        const message = errorMessage(err);
        trace(`Model call failed: ${message}`);
        return captured ?? fallbackResponse(`${MODEL_FAILURE_PREFIX}${message}`);
      }

      messages.push({
        role: 'assistant',
        content: reply.content,
        ...(reply.toolCalls.length > 0 ? { toolCalls: reply.toolCalls } : {}),
      });

      if (reply.toolCalls.length === 0) {
        trace(`Final answer after ${round} round(s) and ${toolCallCount} tool call(s)`);
        return captured ?? fallbackResponse(reply.content ?? '');
      }

      for (const call of reply.toolCalls) {
        toolCallCount++;
        trace(`Tool call #${toolCallCount}: ${call.name}`);
        trace(`  Arguments: ${JSON.stringify(call.arguments)}`);

        const start = performance.now();
        const outcome = await this.runToolCall(call, ctx);
        trace(`  Elapsed: ${(performance.now() - start).toFixed(2)}ms`);
        trace(`  Result: ${preview(outcome.content)}`);

        if (call.name === 'format_response' && outcome.ran) {
          captured = this.captureResponse(outcome.content, call);
        }

        messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content: outcome.content });
      }
    }

    trace(`Maximum rounds (${maxRounds}) reached after ${toolCallCount} tool call(s)`);
    return captured ?? fallbackResponse(`Maximum rounds (${maxRounds}) reached. Unable to complete the request.`);
  }

  private async runToolCall(call: ToolCall, ctx: ToolContext): Promise<ToolOutcome> {
    try {
      return { content: await this.registry.dispatch(call, ctx), ran: true };
    } catch (err: unknown) {
      return { content: `Error: ${errorMessage(err)}`, ran: false };
    }
  }

  private captureResponse(content: string, call: ToolCall): StructuredResponse {
    try {
      return parseResponse(content);
    } catch {
      return fallbackResponse(content, call.arguments.sql_query ?? NO_SQL);
    }
  }
}
