/**
 * Field descriptors extracted from a parameter schema.
 */

export type ScalarKind = "bool" | "int" | "float" | "string";

/** Declared type of a schema field, as a tagged variant. */
export type FieldType =
  | { kind: "scalar"; scalar: ScalarKind }
  | { kind: "enum"; choices: readonly string[] }
  | { kind: "optional"; inner: FieldType }
  | { kind: "sequence"; element: FieldType }
  | { kind: "nested"; fields: readonly FieldDescriptor[] };

/** Numeric bound; `inclusive: false` comes from `gt`/`lt`. */
export interface Bound {
  value: number;
  inclusive: boolean;
}

export interface FieldConstraints {
  min?: Bound;
  max?: Bound;
  pattern?: string;
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
}

/** Extracted metadata for one schema field. Frozen once built. */
export interface FieldDescriptor {
  /** Dotted field name; flattened nested fields read as "db.host". */
  name: string;
  /** Object path of the field inside the schema instance. */
  path: readonly string[];
  type: FieldType;
  /** Declared default; undefined when the field has none. */
  defaultValue: unknown;
  hasDefault: boolean;
  required: boolean;
  /** Absent value is `null` instead of `undefined`. */
  nullable: boolean;
  constraints: FieldConstraints;
  /** Primary long flag token, e.g. "--dry-run". */
  flag: string;
  /** True when `flag` came from an explicit alias. */
  aliased: boolean;
  /** Single-letter short flag without the dash. */
  short?: string;
  help: string;
}

/**
 * CLI-only annotations attached to a schema node with `cliField()`.
 * Everything else (type, default, constraints, help) is read from the schema.
 */
export interface FieldMeta {
  /** Long flag to use instead of the derived one ("--out" or "out"). */
  alias?: string;
  /** Short flag letter ("v" or "-v"). */
  short?: string;
  /** Help text overriding `.describe()`. */
  help?: string;
  /** Expose the fields of a nested object as top-level flags. */
  flatten?: boolean;
}

/** Strip optional wrappers. */
export function unwrapOptional(type: FieldType): FieldType {
  return type.kind === "optional" ? unwrapOptional(type.inner) : type;
}
