/**
 * Renders success payloads on stdout.
 *
 * Supports `plain` and `json`. Other formats fall back to json.
 */

import { inspect } from "node:util";
import type { OutputFormat, OutputFormatter } from "@paramcli/sdk";
import type { Logger } from "@paramcli/shared";

export interface OutputFormatterOptions {
  color?: boolean;
}

export function createOutputFormatter(options: OutputFormatterOptions = {}): OutputFormatter {
  const colors = options.color ?? false;

  const value = (item: unknown): string =>
    typeof item === "string" ? item : inspect(item, { colors, depth: null, breakLength: Infinity });

  const plain = (payload: unknown): string => {
    if (payload === undefined || payload === null) return "";
    if (typeof payload === "string") return payload;
    if (Array.isArray(payload)) return payload.map(value).join("\n");
    if (typeof payload === "object") {
      return Object.entries(payload)
        .map(([key, item]) => `${key}: ${value(item)}`)
        .join("\n");
    }
    return value(payload);
  };

  return {
    supports: (format) => format === "plain" || format === "json",
    format: (payload, format) => (format === "json" ? JSON.stringify(payload, null, 2) : plain(payload)),
  };
}

/**
 * Text to print for a payload. Strings (help text) are printed as they are
 * in every format.
 */
export function renderPayload(
  formatter: OutputFormatter,
  payload: unknown,
  format: OutputFormat,
  logger: Logger,
): string {
  if (typeof payload === "string") return payload;
  if (formatter.supports(format)) return formatter.format(payload, format);

  logger.warn(`Output format "${format}" is not supported; using json`);
  return formatter.format(payload, "json");
}
