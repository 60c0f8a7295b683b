/**
 * Schema validator.
 *
 * Builds the target instance from coerced values and runs the schema over
 * it. Unlike the parser it is exhaustive: every violation across every field
 * is returned together.
 */

import { z } from "zod";
import type { FieldViolation, ParameterSpec, ParsedValues, ValidationOutcome } from "@paramcli/sdk";
import { deepFreeze } from "../utils/freeze.js";

const ROOT = "(root)";

export function validateValues<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  parameters: readonly ParameterSpec[],
  values: ParsedValues,
): ValidationOutcome<T> {
  const result = schema.safeParse(buildInput(parameters, values));
  if (result.success) {
    return { valid: true, value: deepFreeze(result.data) };
  }

  const order = (path: readonly (string | number)[]): number => {
    const index = parameters.findIndex((spec) => spec.path.every((key, i) => path[i] === key));
    return index === -1 ? parameters.length : index;
  };
  const violations = result.error.issues
    .map((issue, position) => ({ issue, position, rank: order(issue.path) }))
    .sort((a, b) => a.rank - b.rank || a.position - b.position)
    .map(({ issue }) => toViolation(issue, parameters));

  return { valid: false, violations };
}

/**
 * Nest dotted values back into objects. Absent enabling booleans become
 * `false`, absent lists `[]` and absent nullable fields `null`; everything
 * else is left out so the schema applies its own defaults.
 */
function buildInput(parameters: readonly ParameterSpec[], values: ParsedValues): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  for (const spec of parameters) {
    const parent = ensureParent(input, spec.path);
    const key = spec.path[spec.path.length - 1];

    if (Object.hasOwn(values, spec.name)) {
      parent[key] = values[spec.name];
    } else if (spec.hasDefault) {
      continue;
    } else if (spec.isFlag) {
      parent[key] = false;
    } else if (spec.multiplicity === "repeatable") {
      parent[key] = [];
    } else if (spec.field.nullable) {
      parent[key] = null;
    }
  }

  return input;
}

function ensureParent(input: Record<string, unknown>, path: readonly string[]): Record<string, unknown> {
  let current = input;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toViolation(issue: z.ZodIssue, parameters: readonly ParameterSpec[]): FieldViolation {
  const field = issue.path.length > 0 ? issue.path.join(".") : ROOT;
  const violation = (constraint: string, message: string): FieldViolation => ({ field, constraint, message });

  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined"
        ? violation("required", `${field} is required`)
        : violation("type", `${field}: ${issue.message}`);

    case "too_small":
      if (issue.type === "number" || issue.type === "bigint") {
        return violation("min", `${field} must be ${issue.inclusive ? ">=" : ">"} ${issue.minimum}`);
      }
      if (issue.type === "string") {
        return violation(
          "minLength",
          `${field} must be ${issue.exact ? "exactly" : "at least"} ${issue.minimum} characters`,
        );
      }
      if (issue.type === "array") {
        return violation("minItems", `${field} must have ${issue.exact ? "exactly" : "at least"} ${issue.minimum} items`);
      }
      return violation("min", `${field}: ${issue.message}`);

    case "too_big":
      if (issue.type === "number" || issue.type === "bigint") {
        return violation("max", `${field} must be ${issue.inclusive ? "<=" : "<"} ${issue.maximum}`);
      }
      if (issue.type === "string") {
        return violation(
          "maxLength",
          `${field} must be ${issue.exact ? "exactly" : "at most"} ${issue.maximum} characters`,
        );
      }
      if (issue.type === "array") {
        return violation("maxItems", `${field} must have ${issue.exact ? "exactly" : "at most"} ${issue.maximum} items`);
      }
      return violation("max", `${field}: ${issue.message}`);

    case "invalid_string":
      if (issue.validation === "regex") {
        const pattern = parameters.find((spec) => spec.name === field)?.field.constraints.pattern;
        return violation("pattern", pattern ? `${field} must match pattern ${pattern}` : `${field}: ${issue.message}`);
      }
      return violation("format", `${field}: ${issue.message}`);

    case "invalid_enum_value":
      return violation("choice", `${field} must be one of ${issue.options.join(", ")}`);

    case "custom":
      return violation("custom", `${field}: ${issue.message}`);

    default:
      return violation(issue.code, `${field}: ${issue.message}`);
  }
}
