/**
 * Collaborators that consume what the core produces. The core never prints.
 */

import type { ExecutionResult } from "../types/result.js";

export const outputFormats = ["table", "json", "yaml", "csv", "plain"] as const;
export type OutputFormat = (typeof outputFormats)[number];

/** Renders a handler's success payload in the requested format. */
export interface OutputFormatter {
  supports(format: OutputFormat): boolean;
  format(payload: unknown, format: OutputFormat): string;
}

/** Receives the outcome of every invocation, e.g. for structured failure logs. */
export interface DiagnosticsSink {
  report(command: string | undefined, result: ExecutionResult): void;
}
