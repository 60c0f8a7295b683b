/**
 * Base command interface for the runner's subcommands.
 *
 * A command is a schema plus a synchronous handler; the core derives its
 * flags, parses and validates argv before `handle` runs.
 */

import type { z } from "zod";
import type { ExecutionResult, HandlerContext } from "@paramcli/sdk";
import type { ParamCli } from "@paramcli/core";

export interface CliCommand<TInput> {
  /** Command name (e.g. "version", "config show") */
  readonly name: string;

  /** Command description for help text */
  readonly description: string;

  readonly schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /** Run with validated input. Exit code comes from the returned result. */
  handle(input: Readonly<TInput>, ctx: HandlerContext): ExecutionResult;
}

export function registerCommand<TInput>(cli: ParamCli, command: CliCommand<TInput>): void {
  cli.register(command.name, command.schema, (input, ctx) => command.handle(input, ctx), {
    description: command.description,
  });
}
