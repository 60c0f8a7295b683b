/**
 * Runner: one paramcli invocation from argv to exit code.
 *
 *   paramcli [global options] <command> [options]
 *
 * stdout carries the formatted payload, stderr carries failures and logs.
 * Plain output is colored only when stdout is a terminal and neither
 * NO_COLOR nor --no-color is set.
 */

import { ParamCliError, exitCodeOf } from "@paramcli/sdk";
import type { Diagnostic, ExecutionResult, OutputFormat } from "@paramcli/sdk";
import type { ParamCli } from "@paramcli/core";
import { createLogger, loadSettings, type Logger } from "@paramcli/shared";
import { bootstrap } from "./bootstrap.js";
import { applyGlobalOptions, parseGlobalOptions } from "./utils/global-options.js";
import { createOutputFormatter, renderPayload } from "./utils/output.js";

export interface RunnerIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  io?: RunnerIO;
  signal?: AbortSignal;
  configPath?: string;
  /** Whether stdout is a terminal. Default: `process.stdout.isTTY`. */
  isTTY?: boolean;
}

const consoleIO: RunnerIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export function run(argv: readonly string[], options: RunOptions = {}): number {
  const io = options.io ?? consoleIO;

  const loaded = loadSettings(options.env ?? process.env);
  if (!loaded.success) {
    io.stderr(`Invalid environment: ${loaded.error}`);
    return 2;
  }

  const globals = parseGlobalOptions(argv);
  if (!globals.ok) {
    io.stderr(globals.message);
    return 2;
  }

  const settings = applyGlobalOptions(loaded.data, globals.options);
  const logger = createLogger("paramcli", { level: settings.logLevel, format: settings.logFormat });

  const configPath = globals.options.configFile ?? options.configPath;
  const color = settings.color && (options.isTTY ?? process.stdout.isTTY === true);

  let cli: ParamCli;
  try {
    cli = bootstrap({ logger, debug: settings.debug, signal: options.signal, configPath });
  } catch (err) {
    if (!(err instanceof ParamCliError)) throw err;
    io.stderr(`Startup failed: ${err.message}`);
    return 1;
  }

  const result = cli.dispatch(globals.rest);
  report(result, { io, logger, output: settings.output, color, debug: settings.debug, quiet: settings.quiet });
  return exitCodeOf(result);
}

interface ReportOptions {
  io: RunnerIO;
  logger: Logger;
  output: OutputFormat;
  color: boolean;
  debug: boolean;
  quiet: boolean;
}

function report(result: ExecutionResult, { io, logger, output, color, debug, quiet }: ReportOptions): void {
  if (result.ok) {
    if (quiet) return;
    const text = renderPayload(createOutputFormatter({ color }), result.payload, output, logger);
    if (text !== "") io.stdout(text);
    return;
  }

  switch (result.kind) {
    case "usage":
      io.stderr(result.message);
      if (debug) {
        for (const diagnostic of result.diagnostics ?? []) io.stderr(`  ${describeDiagnostic(diagnostic)}`);
      }
      return;
    case "interrupted":
      io.stderr(result.message);
      return;
    case "handler":
      io.stderr(`Error: ${result.message}`);
      return;
  }
}

function describeDiagnostic(diagnostic: Diagnostic): string {
  const parts = [`field=${diagnostic.field ?? "-"}`];
  if (diagnostic.constraint !== undefined) parts.push(`constraint=${diagnostic.constraint}`);
  if (diagnostic.token !== undefined) parts.push(`token=${JSON.stringify(diagnostic.token)}`);
  return parts.join(" ");
}
