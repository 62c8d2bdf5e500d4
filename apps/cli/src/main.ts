#!/usr/bin/env node

/**
 * sqlbridge CLI entrypoint.
 * Ask questions about the customer database in plain language.
 */

import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import {
  createLogger,
  createQueryPipeline,
  loadConfig,
  toRecords,
  type Config,
  type Logger,
  type PipelineOutcome,
  type QueryPipeline,
} from '@sqlbridge/core';
import {
  EXIT_CODE_SUCCESS,
  fromFailure,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

interface SourceOptions {
  db?: string;
  schema?: string;
}

interface AskOptions extends SourceOptions {
  caseSensitive: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────────

/** Flags override the environment; the rest comes from .env / process.env. */
function configFor(opts: SourceOptions): Config {
  return loadConfig({
    ...process.env,
    ...(opts.db ? { DATABASE_PATH: opts.db } : {}),
    ...(opts.schema ? { SCHEMA_PATH: opts.schema } : {}),
  });
}

function loggerFor(config: Config, output: OutputOptions): Logger {
  let level: string = process.env.LOG_LEVEL ? config.logLevel : 'warn';
  if (output.debug) level = 'debug';
  if (output.quiet) level = 'silent';
  return createLogger({ level, pretty: Boolean(process.stderr.isTTY) && !output.json });
}

function openPipeline(opts: SourceOptions, output: OutputOptions): { config: Config; pipeline: QueryPipeline } {
  const config = configFor(opts);
  const pipeline = createQueryPipeline(config, { logger: loggerFor(config, output) });
  return { config, pipeline };
}

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function withSourceFlags(cmd: Command): Command {
  return cmd
    .option('--db <path>', 'SQLite database file (overrides DATABASE_PATH)')
    .option('--schema <file>', 'Schema descriptor JSON (overrides SCHEMA_PATH)');
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('sqlbridge')
  .description('Ask questions about a SQLite database in plain language')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential output', false)
  .option('--debug', 'Show internal error details and debug logs', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withSourceFlags(
      program
        .command('ask')
        .description('Translate a question to SQL, validate it and run it read-only')
        .argument('<question>', 'Natural language question')
        .option('--case-sensitive', 'Match text values with exact case', false),
    ).action(async function (this: Command, question: string, opts: AskOptions) {
      await runCommand(this, async (output) => {
        const { config, pipeline } = openPipeline(opts, output);
        if (!config.llm.apiKey) {
          throw usageError('LLM_API_KEY is not set. Add it to .env or the environment.', 'CONFIG_INVALID');
        }

        const controller = new AbortController();
        const onInterrupt = () => controller.abort();
        process.once('SIGINT', onInterrupt);
        let outcome: PipelineOutcome;
        try {
          outcome = await pipeline.translateAndRun(question, opts.caseSensitive, {
            signal: controller.signal,
          });
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }

        if (!outcome.ok) {
          throw fromFailure(outcome);
        }

        if (output.json) {
          printCommandSuccess(
            {
              requestId: outcome.requestId,
              question: outcome.question,
              sql: outcome.sql,
              columns: outcome.result.columns,
              rows: toRecords(outcome.result),
              rowCount: outcome.result.rowCount,
              message: outcome.message,
              elapsedMs: outcome.elapsedMs,
            },
            output,
          );
          return;
        }

        printHuman(`SQL: ${outcome.sql}`, output);
        printHuman('', output);
        printHumanTable(outcome.result.columns, outcome.result.rows, output);
        printHuman('', output);
        printHuman(`${outcome.message} in ${outcome.elapsedMs}ms`, output);
      });
    }),
  ),
  [
    'sqlbridge ask "show me all female customers from mumbai"',
    'sqlbridge ask "customers in Paris" --case-sensitive',
    'sqlbridge ask "how many customers per city" --json',
  ],
);

// ── health ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withSourceFlags(program.command('health').description('Check the database file and schema descriptor')),
  ).action(async function (this: Command, opts: SourceOptions) {
    await runCommand(this, async (output) => {
      const { pipeline } = openPipeline(opts, output);
      const status = await pipeline.health();

      if (!status.ok) {
        throw runtimeError(status.error ?? 'The database is not reachable.', 'HEALTH_FAILED', status);
      }

      if (output.json) {
        printCommandSuccess(status, output);
        return;
      }

      printHuman('Database: reachable', output);
      printHuman(`Schema:   ${status.schemaLoaded ? 'loaded' : 'empty'}`, output);
      for (const [table, count] of Object.entries(status.tables)) {
        printHuman(`  ${table}: ${count} row${count === 1 ? '' : 's'}`, output);
      }
    });
  }),
  ['sqlbridge health', 'sqlbridge health --db ./customers.db --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Print the schema descriptor used for prompts and validation')
      .option('--schema <file>', 'Schema descriptor JSON (overrides SCHEMA_PATH)'),
  ).action(async function (this: Command, opts: SourceOptions) {
    await runCommand(this, (output) => {
      const { pipeline } = openPipeline(opts, output);
      const descriptor = pipeline.schema;

      if (output.json) {
        printCommandSuccess(descriptor, output);
        return;
      }

      for (const table of descriptor.tables) {
        printHuman(`${table.name}${table.description ? ` -- ${table.description}` : ''}`, output);
        printHumanTable(
          ['column', 'type', 'description'],
          table.columns.map((c) => [c.name, c.type, c.description ?? '']),
          output,
        );
        printHuman('', output);
      }
      if (descriptor.examples.length > 0) {
        printHuman('Examples:', output);
        for (const example of descriptor.examples) {
          printHuman(`  "${example.question}"`, output);
          printHuman(`    ${example.sql}`, output);
        }
      }
    });
  }),
  ['sqlbridge schema', 'sqlbridge schema --schema ./schema.json --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
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
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 2;
});
