/**
 * Dispatcher: resolves a command and runs parse → validate → handle.
 *
 * Every invocation produces exactly one ExecutionResult. Parse and
 * validation problems become usage failures (exit code 2) here; handler
 * failures pass through untouched. Handlers are never retried.
 */

import {
  ErrorCode,
  HandlerFailure,
  ParamCliError,
  failure,
  interrupted,
  success,
  usageFailure,
} from "@paramcli/sdk";
import type {
  CommandRegistration,
  Diagnostic,
  DiagnosticsSink,
  ExecutionResult,
  FieldViolation,
  ParseError,
} from "@paramcli/sdk";
import { createLogger, generateInvocationId, type Logger } from "@paramcli/shared";
import type { CommandRegistry } from "../infrastructure/command-registry.js";
import { parseArgv } from "../parsing/parser.js";
import { validateValues } from "../validation/validator.js";
import { renderGroupHelp, renderHelp, renderOverview } from "../help/help.js";
import { HELP_FLAGS } from "../synthesis/synthesizer.js";

export interface DispatcherOptions {
  registry: CommandRegistry;
  /** Shown in usage lines. Default: "paramcli". */
  programName?: string;
  logger?: Logger;
  /** Keep raw tokens and violated constraints in diagnostics. */
  debug?: boolean;
  /** Handed to handlers; an aborted signal stops dispatch before the handler runs. */
  signal?: AbortSignal;
  /** Receives every result, after logging. */
  sink?: DiagnosticsSink;
}

export interface Dispatcher {
  dispatch(argv: readonly string[]): ExecutionResult;
  /** Help for a command, a group, or the whole program when `name` is empty. */
  describe(name?: string): string;
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { registry, debug = false, sink } = options;
  const programName = options.programName ?? "paramcli";
  const baseLogger = options.logger ?? createLogger("paramcli");
  const signal = options.signal ?? new AbortController().signal;

  const isHelp = (token: string): boolean => HELP_FLAGS.some((flag) => flag === token);

  const diagnostic = (entry: Diagnostic): Diagnostic => {
    if (debug) return entry;
    const { token: _token, constraint: _constraint, ...visible } = entry;
    return visible;
  };

  const available = (): string => {
    const names = registry.list().map((registration) => registration.name);
    return names.length > 0 ? names.join(", ") : "(none)";
  };

  function describe(name = ""): string {
    const normalized = name.trim().split(/\s+/).join(" ");
    if (normalized === "") return renderOverview(registry.list(), programName);

    const registration = registry.get(normalized);
    if (registration) return renderHelp(registration, programName);
    if (registry.isGroup(normalized)) {
      return renderGroupHelp(normalized, registry.children(normalized), programName);
    }
    throw new ParamCliError(`Unknown command "${normalized}"`, ErrorCode.UNKNOWN_COMMAND);
  }

  function unresolved(argv: readonly string[], log: Logger): ExecutionResult {
    const words: string[] = [];
    for (const token of argv) {
      if (token.startsWith("-")) break;
      words.push(token);
    }
    const wantsHelp = argv.some(isHelp);

    if (words.length === 0) {
      if (wantsHelp) return success(describe());
      return usageFailure(`No command given. Available commands: ${available()}`);
    }

    for (let count = words.length; count > 0; count--) {
      const group = words.slice(0, count).join(" ");
      if (!registry.isGroup(group)) continue;
      if (wantsHelp) return success(describe(group));
      const subcommands = registry.children(group).map((registration) => registration.name);
      log.warn("Missing subcommand", { group });
      return usageFailure(
        `Missing subcommand for "${group}". Available: ${subcommands.join(", ")}`,
        [diagnostic({ message: "missing subcommand", token: group, constraint: "command" })],
      );
    }

    log.warn("Unknown command", { command: words[0] });
    return usageFailure(
      `Unknown command "${words[0]}". Available commands: ${available()}`,
      [diagnostic({ message: "unknown command", token: words[0], constraint: "command" })],
    );
  }

  function parseFailure(registration: CommandRegistration, error: ParseError, log: Logger): ExecutionResult {
    log.warn("Parse error", {
      field: error.field,
      ...(debug ? { token: error.token } : {}),
      message: error.message,
    });
    const entry: Diagnostic = { message: error.message, token: error.token, constraint: "parse" };
    if (error.field !== undefined) entry.field = error.field;
    return usageFailure(
      `${error.message}\nRun "${programName} ${registration.name} --help" for usage.`,
      [diagnostic(entry)],
    );
  }

  function validationFailure(
    registration: CommandRegistration,
    violations: FieldViolation[],
    log: Logger,
  ): ExecutionResult {
    log.warn("Validation failed", { violations: violations.length });
    return usageFailure(
      `Invalid arguments for "${registration.name}": ${violations.map((v) => v.message).join("; ")}`,
      violations.map((v) => diagnostic({ field: v.field, message: v.message, constraint: v.constraint })),
    );
  }

  function invoke(registration: CommandRegistration, input: Readonly<unknown>, log: Logger): ExecutionResult {
    if (signal.aborted) {
      log.warn("Interrupted before handler");
      return interrupted();
    }

    try {
      return registration.handle(input, { command: registration.name, signal, logger: log });
    } catch (err) {
      if (err instanceof HandlerFailure) {
        return failure(err.message, err.exitCode);
      }
      const message = err instanceof Error ? err.message : String(err);
      log.error("Handler threw", debug && err instanceof Error ? { message, stack: err.stack } : { message });
      return failure(debug ? message : `Command "${registration.name}" failed unexpectedly`);
    }
  }

  function run(argv: readonly string[], log: Logger): { command?: string; result: ExecutionResult } {
    const resolved = registry.resolve(argv);
    if (!resolved) {
      return { result: unresolved(argv, log) };
    }

    const { registration, rest } = resolved;
    log.setContext({ command: registration.name });
    log.debug("Resolved command", { args: rest.length });

    const parsed = parseArgv(registration.parameters, rest);
    if (!parsed.ok) {
      return { command: registration.name, result: parseFailure(registration, parsed.error, log) };
    }
    if (parsed.help) {
      return { command: registration.name, result: success(renderHelp(registration, programName)) };
    }

    const validated = validateValues(registration.schema, registration.parameters, parsed.values);
    if (!validated.valid) {
      return { command: registration.name, result: validationFailure(registration, validated.violations, log) };
    }

    return { command: registration.name, result: invoke(registration, validated.value, log) };
  }

  return {
    dispatch(argv: readonly string[]): ExecutionResult {
      const log = baseLogger.child("dispatch");
      log.setContext({ invocationId: generateInvocationId() });

      const stop = log.time("dispatch");
      const { command, result } = run(argv, log);
      stop();

      if (!result.ok && result.kind === "handler") {
        log.error("Command failed", { message: result.message, exitCode: result.exitCode });
      } else if (result.ok) {
        log.debug("Command completed");
      }
      sink?.report(command, result);
      return result;
    },

    describe,
  };
}
