/**
 * Type descriptor extractor.
 *
 * Walks a zod object schema and emits one FieldDescriptor per field, in
 * declaration order. Extraction is strict: a field whose type has no CLI
 * counterpart raises SchemaError instead of being skipped.
 */

import { z, type ZodTypeAny } from "zod";
import { SchemaError } from "@paramcli/sdk";
import type { FieldConstraints, FieldDescriptor, FieldMeta, FieldType } from "@paramcli/sdk";
import { getFieldMeta } from "./field-meta.js";
import { deepFreeze } from "../utils/freeze.js";

const ROOT = "(root)";
const LONG_FLAG = /^--[a-z0-9][a-z0-9-]*$/i;
const SHORT_FLAG = /^[a-z0-9]$/i;

/** Field schema with its optional/nullable/default/effects layers peeled off. */
interface Peeled {
  base: ZodTypeAny;
  optional: boolean;
  nullable: boolean;
  hasDefault: boolean;
  defaultValue: unknown;
  description?: string;
  meta: FieldMeta;
}

interface Scope {
  path: readonly string[];
  /** Flag prefix inherited from a flattened parent, without dashes. */
  flagPrefix: string;
}

const cache = new WeakMap<ZodTypeAny, readonly FieldDescriptor[]>();

/**
 * Extract the field descriptors of a schema.
 *
 * Memoized by schema identity. The cache only ever receives a complete,
 * frozen list, so a reader sees either nothing or the final result.
 */
export function extractFields(schema: ZodTypeAny): readonly FieldDescriptor[] {
  const cached = cache.get(schema);
  if (cached) return cached;

  const root = rootObject(schema);
  const fields = deepFreeze(walkObject(root, { path: [], flagPrefix: "" }));
  cache.set(schema, fields);
  return fields;
}

/** Derive a long flag from a field name: `dry_run` and `dryRun` give `--dry-run`. */
export function flagFor(name: string): string {
  return `--${kebab(name)}`;
}

function kebab(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/_/g, "-")
    .toLowerCase();
}

function rootObject(schema: ZodTypeAny): z.AnyZodObject {
  let node = schema;
  while (node instanceof z.ZodEffects) {
    node = node.innerType();
  }
  if (!(node instanceof z.ZodObject)) {
    throw new SchemaError(ROOT, `schema must be a zod object, got ${node.constructor.name}`);
  }
  return node;
}

function walkObject(object: z.AnyZodObject, scope: Scope): FieldDescriptor[] {
  const shape: Record<string, unknown> = object.shape;
  const fields: FieldDescriptor[] = [];

  for (const [key, value] of Object.entries(shape)) {
    const path = [...scope.path, key];
    const name = path.join(".");
    if (!(value instanceof z.ZodType)) {
      throw new SchemaError(name, "field is not a zod schema");
    }

    const peeled = peel(value);
    if (peeled.meta.flatten) {
      fields.push(...flatten(name, path, peeled, scope));
      continue;
    }
    fields.push(describe(name, path, peeled, scope));
  }

  return fields;
}

function flatten(name: string, path: string[], peeled: Peeled, scope: Scope): FieldDescriptor[] {
  if (!(peeled.base instanceof z.ZodObject)) {
    throw new SchemaError(name, "only object fields can be flattened");
  }
  if (peeled.optional || peeled.nullable) {
    throw new SchemaError(name, "optional objects cannot be flattened; give the object a default instead");
  }
  const own = peeled.meta.alias ? normalizeAlias(name, peeled.meta.alias).slice(2) : kebab(path[path.length - 1]);
  const flagPrefix = scope.flagPrefix ? `${scope.flagPrefix}-${own}` : own;
  return walkObject(peeled.base, { path, flagPrefix });
}

function describe(name: string, path: string[], peeled: Peeled, scope: Scope): FieldDescriptor {
  const { type: baseType, constraints } = mapType(name, peeled.base, path);
  checkAbsence(name, baseType, peeled);
  const type: FieldType =
    peeled.optional || peeled.nullable ? { kind: "optional", inner: baseType } : baseType;

  const key = path[path.length - 1];
  const flag = peeled.meta.alias
    ? normalizeAlias(name, peeled.meta.alias)
    : flagFor(scope.flagPrefix ? `${scope.flagPrefix}-${key}` : key);

  const descriptor: FieldDescriptor = {
    name,
    path,
    type,
    defaultValue: peeled.defaultValue,
    hasDefault: peeled.hasDefault,
    required: !peeled.optional && !peeled.nullable && !peeled.hasDefault && baseType.kind !== "sequence",
    nullable: peeled.nullable,
    constraints,
    flag,
    aliased: peeled.meta.alias !== undefined,
    help: peeled.meta.help ?? peeled.description ?? "",
  };
  if (peeled.meta.short !== undefined) {
    descriptor.short = normalizeShort(name, peeled.meta.short);
  }
  return descriptor;
}

/**
 * Leaving a flag out has exactly one meaning per field: `false` for an
 * enabling boolean, `[]` for a list, `null` for a nullable field, else the
 * default. Shapes that would need a second meaning are rejected.
 */
function checkAbsence(name: string, type: FieldType, peeled: Peeled): void {
  if (type.kind === "scalar" && type.scalar === "bool" && peeled.nullable) {
    throw new SchemaError(name, "boolean flags cannot be nullable");
  }
  if (type.kind === "sequence") {
    if (peeled.nullable) {
      throw new SchemaError(name, "lists cannot be nullable; an absent list is empty");
    }
    if (peeled.hasDefault && !(Array.isArray(peeled.defaultValue) && peeled.defaultValue.length === 0)) {
      throw new SchemaError(name, "lists can only default to []");
    }
  }
  if (peeled.nullable && peeled.hasDefault && peeled.defaultValue !== null) {
    throw new SchemaError(name, "nullable fields can only default to null");
  }
}

/** Unwrap optional/nullable/default/effects layers, outermost first. */
function peel(schema: ZodTypeAny): Peeled {
  const peeled: Peeled = {
    base: schema,
    optional: false,
    nullable: false,
    hasDefault: false,
    defaultValue: undefined,
    meta: {},
  };

  let node = schema;
  for (;;) {
    const meta = getFieldMeta(node);
    if (meta) peeled.meta = { ...meta, ...peeled.meta };
    peeled.description ??= node.description;

    if (node instanceof z.ZodOptional) {
      peeled.optional = true;
      node = node.unwrap();
    } else if (node instanceof z.ZodNullable) {
      peeled.nullable = true;
      node = node.unwrap();
    } else if (node instanceof z.ZodDefault) {
      if (!peeled.hasDefault) {
        peeled.hasDefault = true;
        peeled.defaultValue = node._def.defaultValue();
      }
      node = node.removeDefault();
    } else if (node instanceof z.ZodEffects) {
      node = node.innerType();
    } else {
      peeled.base = node;
      return peeled;
    }
  }
}

function mapType(
  name: string,
  base: ZodTypeAny,
  path: string[],
): { type: FieldType; constraints: FieldConstraints } {
  if (base instanceof z.ZodBoolean) {
    return { type: { kind: "scalar", scalar: "bool" }, constraints: {} };
  }
  if (base instanceof z.ZodString) {
    return { type: { kind: "scalar", scalar: "string" }, constraints: stringConstraints(base) };
  }
  if (base instanceof z.ZodNumber) {
    return {
      type: { kind: "scalar", scalar: base.isInt ? "int" : "float" },
      constraints: numberConstraints(base),
    };
  }
  if (base instanceof z.ZodEnum) {
    const values: unknown[] = base.options;
    return { type: { kind: "enum", choices: enumChoices(name, values) }, constraints: {} };
  }
  if (base instanceof z.ZodNativeEnum) {
    const values: unknown[] = Object.values(base.enum);
    if (values.some((v) => typeof v === "number")) {
      throw new SchemaError(name, "numeric enums are not supported; use string values");
    }
    return { type: { kind: "enum", choices: enumChoices(name, values) }, constraints: {} };
  }
  if (base instanceof z.ZodArray) {
    return mapSequence(name, base, path);
  }
  if (base instanceof z.ZodObject) {
    return {
      type: { kind: "nested", fields: walkObject(base, { path, flagPrefix: "" }) },
      constraints: {},
    };
  }
  throw new SchemaError(name, `type ${base.constructor.name} cannot be mapped to a CLI parameter`);
}

function mapSequence(
  name: string,
  array: z.ZodArray<ZodTypeAny>,
  path: string[],
): { type: FieldType; constraints: FieldConstraints } {
  const element = peel(array.element);
  if (element.optional || element.nullable || element.hasDefault) {
    throw new SchemaError(name, "list elements cannot be optional or defaulted");
  }
  const { type, constraints } = mapType(name, element.base, path);
  if (type.kind === "sequence" || type.kind === "nested") {
    throw new SchemaError(name, `lists of ${type.kind === "sequence" ? "lists" : "objects"} are not supported`);
  }
  if (type.kind === "scalar" && type.scalar === "bool") {
    throw new SchemaError(name, "lists of booleans are not supported");
  }

  const { minLength, maxLength, exactLength } = array._def;
  const sequenceConstraints: FieldConstraints = { ...constraints };
  const minItems = exactLength?.value ?? minLength?.value;
  const maxItems = exactLength?.value ?? maxLength?.value;
  if (minItems !== undefined) sequenceConstraints.minItems = minItems;
  if (maxItems !== undefined) sequenceConstraints.maxItems = maxItems;

  return { type: { kind: "sequence", element: type }, constraints: sequenceConstraints };
}

function enumChoices(name: string, values: unknown[]): string[] {
  const choices = values.filter((v): v is string => typeof v === "string");
  const seen = new Map<string, string>();
  for (const choice of choices) {
    const folded = choice.toLowerCase();
    const existing = seen.get(folded);
    if (existing !== undefined && existing !== choice) {
      throw new SchemaError(name, `choices "${existing}" and "${choice}" differ only in case`);
    }
    seen.set(folded, choice);
  }
  return [...new Set(choices)];
}

function stringConstraints(schema: z.ZodString): FieldConstraints {
  const constraints: FieldConstraints = {};
  for (const check of schema._def.checks) {
    switch (check.kind) {
      case "min":
        constraints.minLength = Math.max(constraints.minLength ?? 0, check.value);
        break;
      case "max":
        constraints.maxLength = Math.min(constraints.maxLength ?? Infinity, check.value);
        break;
      case "length":
        constraints.minLength = check.value;
        constraints.maxLength = check.value;
        break;
      case "regex":
        constraints.pattern = check.regex.toString();
        break;
    }
  }
  return constraints;
}

function numberConstraints(schema: z.ZodNumber): FieldConstraints {
  const constraints: FieldConstraints = {};
  for (const check of schema._def.checks) {
    if (check.kind === "min") {
      const current = constraints.min;
      if (!current || check.value > current.value || (check.value === current.value && !check.inclusive)) {
        constraints.min = { value: check.value, inclusive: check.inclusive };
      }
    } else if (check.kind === "max") {
      const current = constraints.max;
      if (!current || check.value < current.value || (check.value === current.value && !check.inclusive)) {
        constraints.max = { value: check.value, inclusive: check.inclusive };
      }
    }
  }
  return constraints;
}

function normalizeAlias(name: string, alias: string): string {
  const flag = alias.startsWith("--") ? alias : `--${alias}`;
  if (!LONG_FLAG.test(flag)) {
    throw new SchemaError(name, `alias "${alias}" is not a valid long flag`);
  }
  return flag.toLowerCase();
}

function normalizeShort(name: string, short: string): string {
  const letter = short.startsWith("-") ? short.slice(1) : short;
  if (!SHORT_FLAG.test(letter)) {
    throw new SchemaError(name, `short flag "${short}" must be a single letter or digit`);
  }
  return letter;
}
