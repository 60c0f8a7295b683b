/**
 * Parameter synthesizer: FieldDescriptor[] → ParameterSpec[].
 *
 * Boolean polarity: a boolean defaulting to `true` is exposed only as the
 * disabling flag `--no-<name>`; every other boolean is exposed as
 * `--<name>` and its presence sets `true`.
 */

import { SpecCollisionError, unwrapOptional } from "@paramcli/sdk";
import type { FieldDescriptor, FieldType, ParameterSpec, ParameterTypeTag } from "@paramcli/sdk";
import { deepFreeze } from "../utils/freeze.js";

/** Tokens the dispatcher keeps for itself. */
export const HELP_FLAGS = ["--help", "-h"] as const;
const HELP_OWNER = "help";

export function synthesizeParameters(
  command: string,
  fields: readonly FieldDescriptor[],
): readonly ParameterSpec[] {
  const owners = new Map<string, string>(HELP_FLAGS.map((token) => [token, HELP_OWNER] as const));
  const claim = (token: string, field: string): void => {
    const owner = owners.get(token);
    if (owner !== undefined) {
      throw new SpecCollisionError(command, token, [owner, field]);
    }
    owners.set(token, field);
  };

  const specs = fields.map((field) => {
    const spec = toParameter(field);
    claim(spec.flag, field.name);
    if (spec.short !== undefined) claim(`-${spec.short}`, field.name);
    return spec;
  });

  return deepFreeze(specs);
}

function toParameter(field: FieldDescriptor): ParameterSpec {
  const base = unwrapOptional(field.type);
  const element = base.kind === "sequence" ? base.element : base;
  const isFlag = element.kind === "scalar" && element.scalar === "bool";
  const negated = isFlag && field.hasDefault && field.defaultValue === true;

  const spec: ParameterSpec = {
    name: field.name,
    path: field.path,
    flag: negated ? `--no-${field.flag.slice(2)}` : field.flag,
    typeTag: typeTagOf(element),
    defaultValue: field.defaultValue,
    hasDefault: field.hasDefault,
    required: field.required && !isFlag,
    isFlag,
    negated,
    multiplicity: base.kind === "sequence" ? "repeatable" : "single",
    help: field.help,
    field,
  };
  if (field.short !== undefined) spec.short = field.short;
  if (element.kind === "enum") spec.choices = element.choices;
  return spec;
}

function typeTagOf(type: FieldType): ParameterTypeTag {
  switch (type.kind) {
    case "scalar":
      return type.scalar;
    case "enum":
      return "choice";
    case "nested":
      return "json";
    case "optional":
      return typeTagOf(type.inner);
    case "sequence":
      return typeTagOf(type.element);
  }
}
