/**
 * CLI annotations for schema nodes.
 *
 * zod has no slot for flag aliases or flattening, so they live in a side
 * table keyed by the schema node. Wrapping a node afterwards (`.optional()`,
 * `.default()`) keeps the annotation reachable: the extractor looks at every
 * layer it unwraps.
 *
 * @example
 * const Deploy = z.object({
 *   verbose: cliField(z.boolean().default(false), { short: "v" }),
 *   output: cliField(z.string().optional(), { alias: "--out" }),
 * });
 */

import type { ZodTypeAny } from "zod";
import type { FieldMeta } from "@paramcli/sdk";

const annotations = new WeakMap<ZodTypeAny, FieldMeta>();

export function cliField<T extends ZodTypeAny>(schema: T, meta: FieldMeta): T {
  annotations.set(schema, { ...annotations.get(schema), ...meta });
  return schema;
}

export function getFieldMeta(schema: ZodTypeAny): FieldMeta | undefined {
  return annotations.get(schema);
}
