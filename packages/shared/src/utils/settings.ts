/**
 * Process-wide CLI settings, read from the environment.
 *
 * Command-line global flags override these; see the runner.
 */

import { z } from "zod";
import { outputFormats } from "@paramcli/sdk";
import { logFormats, logLevels } from "../logger/index.js";
import { validateInput, type ValidationResult } from "./validation.js";

export const CliSettingsSchema = z.object({
  debug: z.boolean().default(false),
  logLevel: z.enum(logLevels).default("info"),
  logFormat: z.enum(logFormats).default("text"),
  output: z.enum(outputFormats).default("plain"),
  /** Stays true when stdout is not a terminal; the runner checks that itself. */
  color: z.boolean().default(true),
  quiet: z.boolean().default(false),
});

export type CliSettings = z.infer<typeof CliSettingsSchema>;

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off", ""]);

/** "1"/"true"/"yes"/"on" → true, "0"/"false"/"no"/"off"/"" → false; anything else is left for the schema to reject. */
function envFlag(value: string | undefined): boolean | string | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return value;
}

function envEnum(value: string | undefined): string | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized ? normalized : undefined;
}

/**
 * Build settings from environment variables:
 * PARAMCLI_DEBUG, LOG_LEVEL, LOG_FORMAT, PARAMCLI_OUTPUT, PARAMCLI_QUIET
 * and NO_COLOR (any non-empty value disables color).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): ValidationResult<CliSettings> {
  return validateInput(CliSettingsSchema, {
    debug: envFlag(env.PARAMCLI_DEBUG),
    logLevel: envEnum(env.LOG_LEVEL),
    logFormat: envEnum(env.LOG_FORMAT),
    output: envEnum(env.PARAMCLI_OUTPUT),
    color: env.NO_COLOR ? false : undefined,
    quiet: envFlag(env.PARAMCLI_QUIET),
  });
}
