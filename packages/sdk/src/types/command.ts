/**
 * Command registration and handler contract.
 */

import type { z } from "zod";
import type { FieldDescriptor } from "./field.js";
import type { ParameterSpec } from "./parameter.js";
import type { ExecutionResult } from "./result.js";

/** Minimal logging surface handed to handlers. */
export interface HandlerLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/** Context passed to a handler alongside the validated instance. */
export interface HandlerContext {
  /** Resolved command name, e.g. "config show". */
  command: string;
  /** Aborted on interrupt; handlers return `interrupted()` once they see it. */
  signal: AbortSignal;
  logger: HandlerLogger;
}

/**
 * Command handler. Synchronous: async work is bridged by whoever calls the
 * dispatcher, so one invocation yields exactly one result.
 */
export type CommandHandler<TInput> = (
  input: Readonly<TInput>,
  ctx: HandlerContext,
) => ExecutionResult;

export interface RegisterOptions {
  description?: string;
}

/** An immutable entry of the command registry. */
export interface CommandRegistration<TInput = unknown> {
  /** Normalized command path, segments separated by one space. */
  readonly name: string;
  readonly description: string;
  /** Parent group path ("config" for "config show"), undefined at top level. */
  readonly group?: string;
  readonly schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  readonly fields: readonly FieldDescriptor[];
  readonly parameters: readonly ParameterSpec[];
  handle(input: Readonly<TInput>, ctx: HandlerContext): ExecutionResult;
}
