#!/usr/bin/env node

/**
 * askdb CLI entrypoint: ask questions of a SQLite database in plain language.
 */

import * as dotenv from 'dotenv';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import {
  Agent,
  ConfigError,
  OpenAIChatModel,
  inspectSchema,
  loadConfig,
  loadModelConfig,
  testConnection,
  type AskdbConfig,
  type ModelConfig,
} from '@askdb/core';
import { normalizeArgv } from './argv.js';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  assertAnswered,
  fromConfigError,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printResponse,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

dotenv.config();

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error instanceof ConfigError ? fromConfigError(error) : error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0 || String(n) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function requireDatabase(path: string | undefined): string {
  if (!path) {
    throw usageError('Missing --db <path>.');
  }
  if (!existsSync(path)) {
    throw usageError(`Database file not found: ${path}`, 'DB_NOT_FOUND');
  }
  return path;
}

function describeModel(config: ModelConfig): string {
  return config.provider === 'azure'
    ? `Azure OpenAI deployment "${config.model}" at ${config.endpoint} (api ${config.apiVersion})`
    : `OpenAI model "${config.model}"`;
}

function createModel(config: AskdbConfig): OpenAIChatModel {
  try {
    return new OpenAIChatModel(config.model);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw runtimeError(`Could not create the model client: ${message}`, 'MODEL_FAILED');
  }
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askdb')
  .description('askdb — ask questions of a SQLite database in plain language')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check the Node.js version and the model configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeMajor = parseInt(nodeVersion.slice(1), 10);
          const nodeOk = nodeMajor >= 20;

          let model: ModelConfig | null = null;
          let configError: string | null = null;
          try {
            model = loadModelConfig();
          } catch (error: unknown) {
            if (!(error instanceof ConfigError)) throw error;
            configError = error.message;
          }
          const maxRounds = model ? loadConfig().maxRounds : null;

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            model: model
              ? {
                  provider: model.provider,
                  model: model.model,
                  ...(model.provider === 'azure' ? { endpoint: model.endpoint, apiVersion: model.apiVersion } : {}),
                  timeoutMs: model.timeoutMs,
                  maxRetries: model.maxRetries,
                }
              : null,
            maxRounds,
            configError,
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('askdb doctor', output);
          printHuman('============', output);
          printHuman('', output);
          printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          if (model) {
            printHuman(`Model:      ${describeModel(model)} ✓`, output);
            printHuman(`Timeout:    ${model.timeoutMs}ms, ${model.maxRetries} retries`, output);
            printHuman(`Max rounds: ${maxRounds}`, output);
          } else {
            printHuman('Model:      ✗ not configured', output);
            printWarning(configError ?? 'Model configuration is incomplete.', output);
          }
        });
      }),
  ),
  ['askdb doctor', 'askdb doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Show the tables, row counts and columns of a SQLite database')
      .requiredOption('--db <path>', 'Path to the SQLite database file')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const dbPath = requireDatabase(this.opts<{ db?: string }>().db);
          const connection = await testConnection(dbPath);
          if (!connection.ok) {
            throw runtimeError(connection.error ?? 'Could not open the database.', 'DB_NOT_FOUND');
          }

          const snapshot = await inspectSchema(dbPath);
          if (output.json) {
            printCommandSuccess({ sqliteVersion: connection.serverVersion, ...snapshot }, output);
            return;
          }

          if (output.verbose) {
            printHuman(`SQLite ${connection.serverVersion}`, output);
          }
          if (snapshot.tables.length === 0) {
            printHuman('(no tables)', output);
            return;
          }
          for (const table of snapshot.tables) {
            printHuman(`${table.name} (${table.rowCount} row${table.rowCount !== 1 ? 's' : ''})`, output);
            for (const column of table.columns) {
              const flags = [column.primaryKey ? 'PK' : '', column.nullable ? '' : 'NOT NULL'].filter(Boolean);
              printHuman(`  ${column.name} ${column.type || 'ANY'}${flags.length > 0 ? ` [${flags.join(', ')}]` : ''}`, output);
            }
          }
        });
      }),
  ),
  ['askdb schema --db titanic.db', 'askdb schema --db titanic.db --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a natural language question; the model discovers the schema, writes and runs the SQL')
      .argument('<question>', 'Natural language question')
      .requiredOption('--db <path>', 'Path to the SQLite database file')
      .option('--max-rounds <n>', 'Maximum model rounds before giving up', parsePositiveInt)
      .action(async function (this: Command, question: string) {
        await runCommand(this, async (output) => {
          const opts = this.opts<{ db?: string; maxRounds?: number }>();
          if (!question.trim()) {
            throw usageError('Question must not be empty.');
          }
          const dbPath = requireDatabase(opts.db);
          const config = loadConfig();
          const model = createModel(config);

          if (output.verbose && !output.json) {
            printHuman(`Model: ${describeModel(config.model)}`, output);
          }

          const agent = new Agent({
            model,
            maxRounds: opts.maxRounds ?? config.maxRounds,
            // keep stdout parseable under --json
            verbose: output.verbose && !output.json,
            log: (line) => printHuman(line, output),
          });
          const response = assertAnswered(await agent.ask(question, dbPath));
          printResponse(response, output);
        });
      }),
  ),
  [
    'askdb ask "How many passengers survived?" --db titanic.db',
    'askdb ask "Which passengers were older than 60?" --db titanic.db --json',
    'askdb ask "List third class passengers" --db titanic.db --verbose --max-rounds 8',
  ],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
