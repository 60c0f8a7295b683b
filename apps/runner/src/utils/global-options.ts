/**
 * Global options given before the command name:
 *
 *   paramcli -o json --log-level debug deploy --name svc
 *
 * The flags are synthesized from a schema and parsed with the same parser
 * commands use, so `--output=json` and `--no-color` behave the same way.
 * Parsing stops at the first token that is not a global option.
 */

import { z } from "zod";
import { ParseError, ValidationError, outputFormats } from "@paramcli/sdk";
import type { ParameterSpec } from "@paramcli/sdk";
import { cliField, extractFields, parseInput, synthesizeParameters } from "@paramcli/core";
import { logFormats, logLevels, type CliSettings } from "@paramcli/shared";

export const GlobalOptionsSchema = z
  .object({
    debug: z.boolean().default(false).describe("Show raw tokens in diagnostics and log stack traces"),
    verbose: cliField(z.boolean().default(false).describe("Log at debug level"), { short: "v" }),
    quiet: cliField(z.boolean().default(false).describe("Print nothing on success"), { short: "q" }),
    output: cliField(z.enum(outputFormats).optional().describe("Output format"), { short: "o" }),
    logLevel: z.enum(logLevels).optional().describe("Minimum log level"),
    logFormat: z.enum(logFormats).optional().describe("Log line format"),
    configFile: cliField(z.string().min(1).optional().describe("Settings file to use"), { short: "c" }),
    noColor: z.boolean().default(false).describe("Disable colored output"),
  })
  .refine((options) => !(options.verbose && options.quiet), {
    message: "cannot be combined with --verbose",
    path: ["quiet"],
  });

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

const GLOBAL_COMMAND = "(global)";

export const globalParameters = synthesizeParameters(GLOBAL_COMMAND, extractFields(GlobalOptionsSchema));

const byToken = new Map<string, ParameterSpec>();
for (const spec of globalParameters) {
  byToken.set(spec.flag, spec);
  if (spec.short !== undefined) byToken.set(`-${spec.short}`, spec);
}

export type GlobalParseResult =
  | { ok: true; options: Readonly<GlobalOptions>; rest: string[] }
  | { ok: false; message: string };

export function parseGlobalOptions(argv: readonly string[]): GlobalParseResult {
  let end = 0;
  while (end < argv.length) {
    const token = argv[end];
    if (!token.startsWith("-")) break;
    const long = token.startsWith("--");
    const spec = byToken.get(long ? token.split("=", 1)[0].toLowerCase() : token);
    if (!spec) break;
    end += spec.isFlag || (long && token.includes("=")) ? 1 : 2;
  }

  try {
    const options = parseInput(GlobalOptionsSchema, argv.slice(0, end), GLOBAL_COMMAND);
    return { ok: true, options, rest: argv.slice(end) };
  } catch (err) {
    if (err instanceof ParseError || err instanceof ValidationError) {
      return { ok: false, message: err.message };
    }
    throw err;
  }
}

/**
 * Command-line options win over settings read from the environment. Flags
 * can only switch a boolean setting on; leaving one out keeps the
 * environment's value.
 */
export function applyGlobalOptions(settings: CliSettings, options: Readonly<GlobalOptions>): CliSettings {
  const quiet = options.quiet || settings.quiet;
  const implied = options.verbose ? "debug" : quiet ? "error" : settings.logLevel;
  return {
    ...settings,
    debug: options.debug || settings.debug,
    output: options.output ?? settings.output,
    logLevel: options.logLevel ?? implied,
    logFormat: options.logFormat ?? settings.logFormat,
    color: options.noColor ? false : settings.color,
    quiet,
  };
}
