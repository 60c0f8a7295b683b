/**
 * Uniform success/failure channel shared by every stage.
 */

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
  INTERRUPTED: 130,
} as const;

export type FailureKind = "handler" | "usage" | "interrupted";

/** Field-scoped diagnostic attached to usage failures. */
export interface Diagnostic {
  field?: string;
  message: string;
  /** Offending raw token; only kept in debug mode. */
  token?: string;
  /** Violated constraint; only kept in debug mode. */
  constraint?: string;
}

export interface Success<T = unknown> {
  ok: true;
  payload: T;
  exitCode?: number;
}

export interface Failure {
  ok: false;
  kind: FailureKind;
  message: string;
  exitCode?: number;
  diagnostics?: Diagnostic[];
}

export type ExecutionResult<T = unknown> = Success<T> | Failure;

export function success<T>(payload: T, exitCode?: number): Success<T> {
  return exitCode === undefined ? { ok: true, payload } : { ok: true, payload, exitCode };
}

/** Handler-reported failure; the message is surfaced verbatim. */
export function failure(message: string, exitCode?: number): Failure {
  return exitCode === undefined
    ? { ok: false, kind: "handler", message }
    : { ok: false, kind: "handler", message, exitCode };
}

export function usageFailure(message: string, diagnostics: Diagnostic[] = []): Failure {
  return { ok: false, kind: "usage", message, exitCode: ExitCode.USAGE, diagnostics };
}

/** Result a handler returns after observing cancellation. */
export function interrupted(reason?: string): Failure {
  return {
    ok: false,
    kind: "interrupted",
    message: reason ? `interrupted: ${reason}` : "interrupted",
    exitCode: ExitCode.INTERRUPTED,
  };
}

export function isSuccess<T>(result: ExecutionResult<T>): result is Success<T> {
  return result.ok;
}

/** Map a result to the process exit code. */
export function exitCodeOf(result: ExecutionResult): number {
  if (result.exitCode !== undefined) return result.exitCode;
  if (result.ok) return ExitCode.SUCCESS;
  switch (result.kind) {
    case "usage":
      return ExitCode.USAGE;
    case "interrupted":
      return ExitCode.INTERRUPTED;
    default:
      return ExitCode.FAILURE;
  }
}
