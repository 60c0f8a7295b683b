/**
 * CLI-facing parameter specs and per-invocation outcomes.
 */

import type { FieldDescriptor } from "./field.js";
import type { ParseError } from "../errors/base.js";

/** Type tag shown in help and used for coercion. */
export type ParameterTypeTag = "bool" | "int" | "float" | "string" | "choice" | "json";

export type Multiplicity = "single" | "repeatable";

/** Flag definition derived 1:1 from a FieldDescriptor. */
export interface ParameterSpec {
  /** Same as the descriptor name; key in the parsed value map. */
  name: string;
  path: readonly string[];
  flag: string;
  short?: string;
  typeTag: ParameterTypeTag;
  /** Declared choice set for `choice` specs. */
  choices?: readonly string[];
  defaultValue: unknown;
  hasDefault: boolean;
  required: boolean;
  /** Takes no value token. */
  isFlag: boolean;
  /** Presence sets the field to `false` (`--no-<name>`). */
  negated: boolean;
  multiplicity: Multiplicity;
  help: string;
  field: FieldDescriptor;
}

/** Coerced values keyed by parameter name; absent flags have no key. */
export type ParsedValues = Readonly<Record<string, unknown>>;

/**
 * `help` is set when `--help`/`-h` appeared in a flag position; parsing
 * stops there and the values seen so far are returned.
 */
export type ParseOutcome =
  | { ok: true; values: ParsedValues; help?: true }
  | { ok: false; error: ParseError };

/** One failed constraint of one field. */
export interface FieldViolation {
  field: string;
  /** Constraint that failed: "required", "min", "max", "pattern", "type", ... */
  constraint: string;
  message: string;
}

export type ValidationOutcome<T> =
  | { valid: true; value: Readonly<T> }
  | { valid: false; violations: FieldViolation[] };
