/**
 * Inverse of parsing: render a schema instance back into argv tokens.
 *
 * Parsing the output with the same specs and validating it yields an
 * instance equal to the input.
 */

import type { ParameterSpec } from "@paramcli/sdk";

export function renderArgv(specs: readonly ParameterSpec[], instance: unknown): string[] {
  const argv: string[] = [];

  for (const spec of specs) {
    const value = readPath(instance, spec.path);
    if (value === undefined || value === null) continue;

    if (spec.isFlag) {
      if (value === !spec.negated) argv.push(spec.flag);
      continue;
    }

    const values = spec.multiplicity === "repeatable" && Array.isArray(value) ? value : [value];
    for (const item of values) {
      argv.push(spec.flag, renderValue(spec, item));
    }
  }

  return argv;
}

function renderValue(spec: ParameterSpec, value: unknown): string {
  if (spec.typeTag === "json") return JSON.stringify(value);
  return String(value);
}

function readPath(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    if (current === null || typeof current !== "object") return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
