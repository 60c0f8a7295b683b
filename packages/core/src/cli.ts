/**
 * createCli: one object exposing register / dispatch / describe over an
 * explicit registry instance.
 *
 * @example
 * const cli = createCli({ programName: "svc" });
 * cli.register("deploy", DeploySchema, (input) => success({ deployed: input.name }));
 * const result = cli.dispatch(process.argv.slice(2));
 * process.exitCode = exitCodeOf(result);
 */

import type { DiagnosticsSink, ExecutionResult } from "@paramcli/sdk";
import type { Logger } from "@paramcli/shared";
import { createCommandRegistry, type CommandRegistry } from "./infrastructure/command-registry.js";
import { createDispatcher } from "./dispatch/dispatcher.js";

export interface CliOptions {
  programName?: string;
  logger?: Logger;
  debug?: boolean;
  signal?: AbortSignal;
  sink?: DiagnosticsSink;
  /** Share an existing registry instead of creating one. */
  registry?: CommandRegistry;
}

export interface ParamCli {
  readonly programName: string;
  register: CommandRegistry["register"];
  list: CommandRegistry["list"];
  /** Refuse further registrations; call once startup is done. */
  seal(): void;
  dispatch(argv: readonly string[]): ExecutionResult;
  describe(name?: string): string;
}

export function createCli(options: CliOptions = {}): ParamCli {
  const registry = options.registry ?? createCommandRegistry();
  const programName = options.programName ?? "paramcli";
  const dispatcher = createDispatcher({
    registry,
    programName,
    logger: options.logger,
    debug: options.debug,
    signal: options.signal,
    sink: options.sink,
  });

  return {
    programName,
    register: registry.register.bind(registry),
    list: () => registry.list(),
    seal: () => registry.seal(),
    dispatch: (argv) => dispatcher.dispatch(argv),
    describe: (name) => dispatcher.describe(name),
  };
}
