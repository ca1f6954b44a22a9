import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import type { ChatModel, ChatReply, ChatRequest } from '../llm/types.js';

export interface TempDb {
  dbPath: string;
  cleanup(): void;
}

/** A small passenger table: PassengerId 1, 3 and 5 survived. */
export function createTitanicDb(): TempDb {
  const dir = mkdtempSync(join(tmpdir(), 'askdb-test-'));
  const dbPath = join(dir, 'titanic.db');
  const db = new Database(dbPath);
  db.exec(`
    CREATE TABLE titanic (
      PassengerId INTEGER PRIMARY KEY,
      Name TEXT NOT NULL,
      Survived INTEGER,
      Pclass INTEGER,
      Age REAL
    );
    INSERT INTO titanic (PassengerId, Name, Survived, Pclass, Age) VALUES
      (1, 'Ada Example', 1, 1, 29),
      (2, 'Ben Sample', 0, 3, 40),
      (3, 'Cleo Placeholder', 1, 2, NULL),
      (4, 'Dov Testcase', 0, 3, 22),
      (5, 'Eve Mock', 1, 1, 35);
    CREATE TABLE notes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      body TEXT
    );
  `);
  db.close();
  return {
    dbPath,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export type ScriptStep = ChatReply | Error | ((request: ChatRequest) => ChatReply);

/**
 * In-process ChatModel that replays a fixed script and records every request.
 */
export class ScriptedModel implements ChatModel {
  readonly model = 'scripted';
  readonly requests: ChatRequest[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[] = []) {
    this.steps = [...steps];
  }

  async chat(request: ChatRequest): Promise<ChatReply> {
    // the loop keeps appending to the same array, so keep a copy
    this.requests.push({ ...request, messages: [...request.messages] });
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('ScriptedModel: script exhausted');
    }
    if (step instanceof Error) {
      throw step;
    }
    return typeof step === 'function' ? step(request) : step;
  }
}

export function reply(content: string): ChatReply {
  return { content, toolCalls: [] };
}

export function callTools(...calls: Array<[name: string, args: Record<string, string>]>): ChatReply {
  return {
    content: null,
    toolCalls: calls.map(([name, args], i) => ({ id: `call_${i + 1}`, name, arguments: args })),
  };
}

/** Content of the most recent tool message in a request. */
export function lastToolResult(request: ChatRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    const message = request.messages[i];
    if (message.role === 'tool') return message.content;
  }
  throw new Error('no tool message in request');
}
