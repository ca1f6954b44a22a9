import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { Agent, isModelFailure } from '../agent.js';
import { NO_SQL } from '../response.js';
import { DEFAULT_TOOLS, ToolRegistry } from '../tools/registry.js';
import type { Tool } from '../tools/types.js';
import { callTools, createTitanicDb, lastToolResult, reply, ScriptedModel, type TempDb } from './fixtures.js';

const QUESTION = 'How many passengers survived?';
const SURVIVORS_SQL = 'SELECT * FROM titanic WHERE Survived = 1';

function registryWith(override: Tool): ToolRegistry {
  return new ToolRegistry(
    DEFAULT_TOOLS.map((tool) => (tool.definition.name === override.definition.name ? override : tool)),
  );
}

function toolStub(source: Tool, run: Tool['run']): Tool {
  return { definition: source.definition, run };
}

describe('Agent', () => {
  let tmp: TempDb;
  before(() => {
    tmp = createTitanicDb();
  });
  after(() => tmp.cleanup());

  it('runs the full tool sequence and returns the formatted response', async () => {
    const orchestrator = new ScriptedModel([
      callTools(['discover_database_schema', { database_path: tmp.dbPath }]),
      (req) => callTools(['generate_sql_query', { question: QUESTION, schema_info: lastToolResult(req) }]),
      callTools(['verify_sql_query', { sql_query: SURVIVORS_SQL, schema_info: '{}', question: QUESTION }]),
      callTools(['execute_sql_query', { sql_query: SURVIVORS_SQL, database_path: tmp.dbPath }]),
      (req) =>
        callTools(['format_response', { question: QUESTION, sql_query: SURVIVORS_SQL, results: lastToolResult(req) }]),
      reply('Three passengers survived.'),
    ]);
    const toolModel = new ScriptedModel([
      reply(SURVIVORS_SQL),
      reply('{"valid": true, "issues": [], "suggestions": []}'),
      reply('Three passengers survived: Ada, Cleo and Eve.'),
    ]);

    const agent = new Agent({ model: orchestrator, toolModel, log: () => {} });
    const response = await agent.ask(QUESTION, tmp.dbPath);

    assert.equal(response.answer, 'Three passengers survived: Ada, Cleo and Eve.');
    assert.equal(response.sql, SURVIVORS_SQL);
    assert.equal(response.rowCount, 3);
    assert.deepEqual(
      response.rows.map((row) => row.PassengerId),
      [1, 3, 5],
    );
    assert.equal(orchestrator.requests.length, 6);
    assert.equal(toolModel.requests.length, 3);

    // the schema discovered in round 1 reached the generation prompt
    assert.match(toolModel.requests[0].messages[0].content ?? '', /"titanic": \[/);
    assert.equal(lastToolResult(orchestrator.requests[3]), 'Query verified successfully.');
  });

  it('starts from a system prompt, the question and all five tools', async () => {
    const orchestrator = new ScriptedModel([reply('Nothing to do.')]);
    await new Agent({ model: orchestrator }).ask(QUESTION, tmp.dbPath);

    const request = orchestrator.requests[0];
    assert.equal(request.temperature, 0.1);
    assert.deepEqual(
      request.tools?.map((tool) => tool.name),
      ['discover_database_schema', 'generate_sql_query', 'verify_sql_query', 'execute_sql_query', 'format_response'],
    );
    assert.equal(request.messages.length, 2);
    assert.equal(request.messages[0].role, 'system');
    assert.deepEqual(request.messages[1], {
      role: 'user',
      content: `Database: ${tmp.dbPath}\nQuestion: ${QUESTION}`,
    });
  });

  it('answers with the plain reply when format_response was never called', async () => {
    const orchestrator = new ScriptedModel([reply('I can only answer questions about this database.')]);
    const response = await new Agent({ model: orchestrator }).ask('What is the weather?', tmp.dbPath);
    assert.deepEqual(response, {
      answer: 'I can only answer questions about this database.',
      sql: NO_SQL,
      rows: [],
      rowCount: 0,
    });
    assert.equal(isModelFailure(response), false);
  });

  it('surfaces a rejected DROP without executing it', async () => {
    const orchestrator = new ScriptedModel([
      callTools(['generate_sql_query', { question: 'Remove the passengers', schema_info: '{}' }]),
      (req) =>
        callTools([
          'verify_sql_query',
          { sql_query: lastToolResult(req), schema_info: '{}', question: 'Remove the passengers' },
        ]),
      reply('I cannot run statements that modify the database.'),
    ]);
    const toolModel = new ScriptedModel([reply('DROP TABLE titanic;')]);

    const response = await new Agent({ model: orchestrator, toolModel }).ask('Remove the passengers', tmp.dbPath);

    assert.equal(
      lastToolResult(orchestrator.requests[2]),
      'Error: Dangerous operation detected: DROP. Only SELECT queries are allowed.',
    );
    // generation only; the verifier rejected before any model call
    assert.equal(toolModel.requests.length, 1);
    assert.equal(response.answer, 'I cannot run statements that modify the database.');
    assert.equal(response.sql, NO_SQL);
    assert.equal(response.rowCount, 0);
  });

  it('feeds execution errors back so the model can retry', async () => {
    const orchestrator = new ScriptedModel([
      callTools(['execute_sql_query', { sql_query: 'SELECT * FROM titanic WHERE Lived = 1', database_path: tmp.dbPath }]),
      callTools(['execute_sql_query', { sql_query: SURVIVORS_SQL, database_path: tmp.dbPath }]),
      (req) =>
        callTools(['format_response', { question: QUESTION, sql_query: SURVIVORS_SQL, results: lastToolResult(req) }]),
      reply('Done.'),
    ]);
    const toolModel = new ScriptedModel([reply('Three passengers survived.')]);

    const response = await new Agent({ model: orchestrator, toolModel }).ask(QUESTION, tmp.dbPath);

    assert.equal(lastToolResult(orchestrator.requests[1]), 'Error executing query: no such column: Lived');
    assert.equal(response.answer, 'Three passengers survived.');
    assert.equal(response.rowCount, 3);
  });

  it('stops after the default round budget', async () => {
    const orchestrator = new ScriptedModel(
      Array.from({ length: 15 }, () => callTools(['discover_database_schema', { database_path: tmp.dbPath }])),
    );
    const response = await new Agent({ model: orchestrator }).ask(QUESTION, tmp.dbPath);

    assert.equal(orchestrator.requests.length, 15);
    assert.equal(response.answer, 'Maximum rounds (15) reached. Unable to complete the request.');
    assert.equal(response.sql, NO_SQL);
    assert.equal(response.rowCount, 0);
  });

  it('honours a per-call round budget', async () => {
    const orchestrator = new ScriptedModel([
      callTools(['discover_database_schema', { database_path: tmp.dbPath }]),
      callTools(['discover_database_schema', { database_path: tmp.dbPath }]),
    ]);
    const response = await new Agent({ model: orchestrator, maxRounds: 10 }).ask(QUESTION, tmp.dbPath, {
      maxRounds: 2,
    });
    assert.equal(orchestrator.requests.length, 2);
    assert.equal(response.answer, 'Maximum rounds (2) reached. Unable to complete the request.');
  });

  it('returns the captured response when the budget runs out after format_response', async () => {
    const orchestrator = new ScriptedModel([
      callTools(['format_response', { question: QUESTION, sql_query: SURVIVORS_SQL, results: '[{"PassengerId": 1}]' }]),
      callTools(['discover_database_schema', { database_path: tmp.dbPath }]),
    ]);
    const toolModel = new ScriptedModel([reply('One passenger survived.')]);

    const response = await new Agent({ model: orchestrator, toolModel, maxRounds: 2 }).ask(QUESTION, tmp.dbPath);

    assert.equal(response.answer, 'One passenger survived.');
    assert.equal(response.sql, SURVIVORS_SQL);
    assert.equal(response.rowCount, 1);
  });

  it('reports unknown tools to the model and keeps going', async () => {
    const orchestrator = new ScriptedModel([callTools(['drop_everything', {}]), reply('Sorry.')]);
    const response = await new Agent({ model: orchestrator }).ask(QUESTION, tmp.dbPath);

    assert.equal(
      lastToolResult(orchestrator.requests[1]),
      'Error: Unknown tool "drop_everything". Available tools: discover_database_schema, generate_sql_query, verify_sql_query, execute_sql_query, format_response',
    );
    assert.equal(response.answer, 'Sorry.');
  });

  it('reports missing arguments without running the tool', async () => {
    const orchestrator = new ScriptedModel([callTools(['generate_sql_query', { question: QUESTION }]), reply('Sorry.')]);
    const toolModel = new ScriptedModel();
    await new Agent({ model: orchestrator, toolModel }).ask(QUESTION, tmp.dbPath);

    assert.equal(
      lastToolResult(orchestrator.requests[1]),
      "Error: Invalid arguments for generate_sql_query: /: must have required property 'schema_info'",
    );
    assert.equal(toolModel.requests.length, 0);
  });

  it('turns a throwing tool into an error result', async () => {
    const [discover] = DEFAULT_TOOLS;
    const registry = registryWith(
      toolStub(discover, async () => {
        throw new Error('disk unavailable');
      }),
    );
    const orchestrator = new ScriptedModel([
      callTools(['discover_database_schema', { database_path: tmp.dbPath }]),
      reply('The database could not be read.'),
    ]);

    const response = await new Agent({ model: orchestrator, registry }).ask(QUESTION, tmp.dbPath);

    assert.equal(lastToolResult(orchestrator.requests[1]), 'Error: disk unavailable');
    assert.equal(response.answer, 'The database could not be read.');
  });

  it('does not capture a format_response call that failed to run', async () => {
    const format = DEFAULT_TOOLS[4];
    const registry = registryWith(
      toolStub(format, async () => {
        throw new Error('formatter crashed');
      }),
    );
    const orchestrator = new ScriptedModel([
      callTools(['format_response', { question: QUESTION, sql_query: SURVIVORS_SQL, results: '[]' }]),
      reply('No formatted answer is available.'),
    ]);

    const response = await new Agent({ model: orchestrator, registry }).ask(QUESTION, tmp.dbPath);

    assert.equal(response.answer, 'No formatted answer is available.');
    assert.equal(response.sql, NO_SQL);
  });

  it('falls back to the raw text when format_response output is not a structured response', async () => {
    const format = DEFAULT_TOOLS[4];
    const registry = registryWith(toolStub(format, async () => 'Three rows matched.'));
    const orchestrator = new ScriptedModel([
      callTools(['format_response', { question: QUESTION, sql_query: SURVIVORS_SQL, results: '[]' }]),
      reply('Done.'),
    ]);

    const response = await new Agent({ model: orchestrator, registry }).ask(QUESTION, tmp.dbPath);

    assert.equal(response.answer, 'Three rows matched.');
    assert.equal(response.sql, SURVIVORS_SQL);
    assert.equal(response.rowCount, 0);
  });

  it('returns a fallback response when the orchestrating model fails', async () => {
    const orchestrator = new ScriptedModel([new Error('connection reset')]);
    const response = await new Agent({ model: orchestrator }).ask(QUESTION, tmp.dbPath);

    assert.equal(response.answer, 'Error contacting the language model: connection reset');
    assert.equal(response.sql, NO_SQL);
    assert.equal(response.rowCount, 0);
    assert.equal(isModelFailure(response), true);
  });

  it('keeps the captured response when the model fails afterwards', async () => {
    const orchestrator = new ScriptedModel([
      callTools(['format_response', { question: QUESTION, sql_query: SURVIVORS_SQL, results: '[{"PassengerId": 1}]' }]),
      new Error('connection reset'),
    ]);
    const toolModel = new ScriptedModel([reply('One passenger survived.')]);

    const response = await new Agent({ model: orchestrator, toolModel }).ask(QUESTION, tmp.dbPath);

    assert.equal(response.answer, 'One passenger survived.');
    assert.equal(response.rowCount, 1);
    assert.equal(isModelFailure(response), false);
  });

  it('answers every call of a round in order', async () => {
    const orchestrator = new ScriptedModel([
      callTools(
        ['drop_everything', {}],
        ['execute_sql_query', { sql_query: 'SELECT Name FROM titanic WHERE PassengerId = 2', database_path: tmp.dbPath }],
      ),
      reply('Done.'),
    ]);
    await new Agent({ model: orchestrator }).ask(QUESTION, tmp.dbPath);

    const messages = orchestrator.requests[1].messages;
    assert.equal(messages.length, 5);
    const assistant = messages[2];
    assert.equal(assistant.role, 'assistant');
    assert.equal(assistant.role === 'assistant' ? assistant.toolCalls?.length : undefined, 2);

    const [first, second] = messages.slice(3);
    assert.ok(first.role === 'tool' && second.role === 'tool');
    assert.equal(first.toolCallId, 'call_1');
    assert.equal(first.name, 'drop_everything');
    assert.match(first.content, /^Error: Unknown tool "drop_everything"/);
    assert.equal(second.toolCallId, 'call_2');
    assert.equal(second.name, 'execute_sql_query');
    assert.deepEqual(JSON.parse(second.content), [{ Name: 'Ben Sample' }]);
  });

  describe('verbose trace', () => {
    it('writes nothing unless verbose', async () => {
      const lines: string[] = [];
      const orchestrator = new ScriptedModel([reply('Hello.')]);
      await new Agent({ model: orchestrator, log: (line) => lines.push(line) }).ask(QUESTION, tmp.dbPath);
      assert.deepEqual(lines, []);
    });

    it('traces rounds, tool calls and the final answer', async () => {
      const lines: string[] = [];
      const orchestrator = new ScriptedModel([callTools(['drop_everything', { reason: 'test' }]), reply('Hello.')]);
      const agent = new Agent({ model: orchestrator, log: (line) => lines.push(line) });
      await agent.ask(QUESTION, tmp.dbPath, { verbose: true });

      assert.equal(lines.length, 9);
      assert.deepEqual(lines.slice(0, 5), [
        `Question: ${QUESTION}`,
        `Database: ${tmp.dbPath}`,
        'Round 1/15',
        'Tool call #1: drop_everything',
        '  Arguments: {"reason":"test"}',
      ]);
      assert.match(lines[5], /^ {2}Elapsed: \d+\.\d{2}ms$/);
      assert.match(lines[6], /^ {2}Result: Error: Unknown tool "drop_everything"/);
      assert.deepEqual(lines.slice(7), ['Round 2/15', 'Final answer after 2 round(s) and 1 tool call(s)']);
    });

    it('truncates long tool results in the trace', async () => {
      const lines: string[] = [];
      const orchestrator = new ScriptedModel([
        callTools(['execute_sql_query', { sql_query: 'SELECT * FROM titanic', database_path: tmp.dbPath }]),
        reply('Done.'),
      ]);
      await new Agent({ model: orchestrator, verbose: true, log: (line) => lines.push(line) }).ask(
        QUESTION,
        tmp.dbPath,
      );

      const result = lines.find((line) => line.startsWith('  Result: '));
      assert.ok(result);
      assert.equal(result.length, '  Result: '.length + 200 + '...'.length);
      assert.ok(result.endsWith('...'));
    });
  });
});
