import type { Command } from 'commander';
import { ConfigError } from '@sqlbridge/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(
  columns: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<unknown>>,
  output: OutputOptions,
): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

function errorCode(error: unknown): string {
  if (error instanceof CliError) return error.code;
  if (error instanceof ConfigError) return 'CONFIG_INVALID';
  return 'INTERNAL_ERROR';
}

function errorDetails(error: unknown): unknown {
  if (error instanceof CliError) return error.details ?? null;
  if (error instanceof ConfigError) return { issues: error.issues };
  if (error instanceof Error) return { stack: error.stack };
  return { raw: String(error) };
}

export function printError(error: unknown, output: OutputOptions): void {
  const message = error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: errorCode(error),
      message,
    };
    if (output.debug) {
      payload.details = errorDetails(error);
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (error instanceof CliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential output', false)
    .option('--debug', 'Show internal error details and debug logs', false);
  return command;
}
