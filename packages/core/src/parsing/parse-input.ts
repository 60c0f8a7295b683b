import type { z } from "zod";
import { ParseError, ValidationError } from "@paramcli/sdk";
import { extractFields } from "../schema/extractor.js";
import { synthesizeParameters } from "../synthesis/synthesizer.js";
import { validateValues } from "../validation/validator.js";
import { parseArgv } from "./parser.js";

/**
 * Parse and validate argv against a schema without a registry.
 *
 * @param command - Name used in collision errors.
 * @throws ParseError on the first malformed token, or on `--help`
 * @throws ValidationError with every violation
 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  argv: readonly string[],
  command = "(input)",
): Readonly<T> {
  const parameters = synthesizeParameters(command, extractFields(schema));

  const parsed = parseArgv(parameters, argv);
  if (!parsed.ok) throw parsed.error;
  if (parsed.help) throw new ParseError("--help", "Help is not available here");

  const validated = validateValues(schema, parameters, parsed.values);
  if (!validated.valid) throw new ValidationError(validated.violations);

  return validated.value;
}
