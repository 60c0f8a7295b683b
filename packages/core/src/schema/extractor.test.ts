import { describe, it, expect } from "vitest";
import { z } from "zod";
import { SchemaError } from "@paramcli/sdk";
import { extractFields, flagFor } from "./extractor.js";
import { cliField } from "./field-meta.js";

const DeploySchema = z.object({
  name: z.string().min(2).describe("Service name"),
  retries: z.number().int().min(0).max(10).default(3),
  ratio: z.number().gt(0).lte(1).optional(),
  dry_run: z.boolean().default(false),
  format: z.enum(["json", "yaml", "table"]).default("table"),
  tags: z.array(z.string()).max(3).optional(),
  region: z.string().regex(/^[a-z]+-\d$/).nullable(),
});

describe("extractFields", () => {
  it("emits one descriptor per field in declaration order", () => {
    const fields = extractFields(DeploySchema);
    expect(fields.map((f) => f.name)).toEqual([
      "name",
      "retries",
      "ratio",
      "dry_run",
      "format",
      "tags",
      "region",
    ]);
  });

  it("describes a required string with its constraints and help", () => {
    const [name] = extractFields(DeploySchema);
    expect(name).toEqual({
      name: "name",
      path: ["name"],
      type: { kind: "scalar", scalar: "string" },
      defaultValue: undefined,
      hasDefault: false,
      required: true,
      nullable: false,
      constraints: { minLength: 2 },
      flag: "--name",
      aliased: false,
      help: "Service name",
    });
  });

  it("captures integer bounds and defaults", () => {
    const retries = extractFields(DeploySchema)[1];
    expect(retries.type).toEqual({ kind: "scalar", scalar: "int" });
    expect(retries.required).toBe(false);
    expect(retries.hasDefault).toBe(true);
    expect(retries.defaultValue).toBe(3);
    expect(retries.constraints).toEqual({
      min: { value: 0, inclusive: true },
      max: { value: 10, inclusive: true },
    });
  });

  it("marks optional floats with exclusive bounds", () => {
    const ratio = extractFields(DeploySchema)[2];
    expect(ratio.type).toEqual({ kind: "optional", inner: { kind: "scalar", scalar: "float" } });
    expect(ratio.required).toBe(false);
    expect(ratio.constraints).toEqual({
      min: { value: 0, inclusive: false },
      max: { value: 1, inclusive: true },
    });
  });

  it("derives flags by replacing underscores", () => {
    expect(extractFields(DeploySchema)[3].flag).toBe("--dry-run");
  });

  it("captures enum choices in declared order", () => {
    expect(extractFields(DeploySchema)[4].type).toEqual({
      kind: "enum",
      choices: ["json", "yaml", "table"],
    });
  });

  it("describes optional sequences with item limits", () => {
    const tags = extractFields(DeploySchema)[5];
    expect(tags.type).toEqual({
      kind: "optional",
      inner: { kind: "sequence", element: { kind: "scalar", scalar: "string" } },
    });
    expect(tags.constraints).toEqual({ maxItems: 3 });
  });

  it("treats nullable as optional with a null absent value", () => {
    const region = extractFields(DeploySchema)[6];
    expect(region.required).toBe(false);
    expect(region.nullable).toBe(true);
    expect(region.constraints.pattern).toBe("/^[a-z]+-\\d$/");
  });

  it("memoizes by schema identity and freezes the result", () => {
    const first = extractFields(DeploySchema);
    expect(extractFields(DeploySchema)).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first[0])).toBe(true);
    expect(Object.isFrozen(first[0].constraints)).toBe(true);
  });

  it("yields identical descriptors for structurally identical schemas", () => {
    const make = () => z.object({ a: z.string(), b: z.number().int().default(1) });
    expect(extractFields(make())).toEqual(extractFields(make()));
  });

  it("looks through object-level refinements", () => {
    const schema = z
      .object({ from: z.number(), to: z.number() })
      .refine((v) => v.from <= v.to, { message: "from must not exceed to" });
    expect(extractFields(schema).map((f) => f.name)).toEqual(["from", "to"]);
  });

  describe("cliField annotations", () => {
    it("applies alias, short flag and help override", () => {
      const schema = z.object({
        output: cliField(z.string().describe("ignored"), { alias: "out", short: "-o", help: "Output file" }),
      });
      const [output] = extractFields(schema);
      expect(output.flag).toBe("--out");
      expect(output.aliased).toBe(true);
      expect(output.short).toBe("o");
      expect(output.help).toBe("Output file");
    });

    it("finds annotations below later wrappers", () => {
      const schema = z.object({
        verbose: cliField(z.boolean(), { short: "v" }).default(false),
      });
      expect(extractFields(schema)[0].short).toBe("v");
    });

    it("hyphenates camelCase names", () => {
      expect(flagFor("dryRun")).toBe("--dry-run");
      expect(flagFor("max_retry_count")).toBe("--max-retry-count");
    });

    it("rejects malformed aliases and short flags", () => {
      expect(() =>
        extractFields(z.object({ a: cliField(z.string(), { alias: "--bad flag" }) })),
      ).toThrow(SchemaError);
      expect(() =>
        extractFields(z.object({ a: cliField(z.string(), { short: "ab" }) })),
      ).toThrow(/single letter or digit/);
    });
  });

  describe("nested objects", () => {
    const ServerSchema = z.object({
      db: cliField(
        z.object({
          host: z.string().default("localhost"),
          port: z.number().int().default(5432),
        }),
        { flatten: true },
      ),
      limits: z.object({ cpu: z.number() }).optional(),
    });

    it("flattens only when asked to", () => {
      const fields = extractFields(ServerSchema);
      expect(fields.map((f) => [f.name, f.flag])).toEqual([
        ["db.host", "--db-host"],
        ["db.port", "--db-port"],
        ["limits", "--limits"],
      ]);
      expect(fields[0].path).toEqual(["db", "host"]);
    });

    it("keeps unflattened objects as a nested type", () => {
      const limits = extractFields(ServerSchema)[2];
      expect(limits.type.kind).toBe("optional");
      if (limits.type.kind === "optional" && limits.type.inner.kind === "nested") {
        expect(limits.type.inner.fields.map((f) => f.name)).toEqual(["limits.cpu"]);
      } else {
        throw new Error("expected an optional nested type");
      }
    });

    it("uses an alias of the flattened parent as flag prefix", () => {
      const schema = z.object({
        database: cliField(z.object({ host: z.string() }), { flatten: true, alias: "db" }),
      });
      expect(extractFields(schema)[0].flag).toBe("--db-host");
    });

    it("refuses to flatten optional objects", () => {
      const schema = z.object({
        db: cliField(z.object({ host: z.string() }), { flatten: true }).optional(),
      });
      expect(() => extractFields(schema)).toThrow(/cannot be flattened/);
    });
  });

  describe("enums", () => {
    it("supports string native enums", () => {
      enum Color {
        Red = "red",
        Blue = "blue",
      }
      const [color] = extractFields(z.object({ color: z.nativeEnum(Color) }));
      expect(color.type).toEqual({ kind: "enum", choices: ["red", "blue"] });
    });

    it("rejects numeric native enums", () => {
      enum Level {
        Low,
        High,
      }
      expect(() => extractFields(z.object({ level: z.nativeEnum(Level) }))).toThrow(/numeric enums/);
    });

    it("rejects choices that differ only in case", () => {
      expect(() => extractFields(z.object({ mode: z.enum(["Fast", "fast"]) }))).toThrow(
        /differ only in case/,
      );
    });
  });

  describe("strictness", () => {
    it("rejects a non-object root", () => {
      expect(() => extractFields(z.string())).toThrow(/must be a zod object/);
    });

    it("rejects unsupported field types", () => {
      const schema = z.object({ value: z.union([z.string(), z.number()]) });
      expect(() => extractFields(schema)).toThrow(SchemaError);
      expect(() => extractFields(schema)).toThrow(/Field "value": type .* cannot be mapped/);
    });

    it("rejects lists of objects, lists of lists and lists of booleans", () => {
      expect(() => extractFields(z.object({ a: z.array(z.object({ b: z.string() })) }))).toThrow(
        /lists of objects/,
      );
      expect(() => extractFields(z.object({ a: z.array(z.array(z.string())) }))).toThrow(/lists of lists/);
      expect(() => extractFields(z.object({ a: z.array(z.boolean()) }))).toThrow(/lists of booleans/);
    });

    it("rejects optional list elements", () => {
      expect(() => extractFields(z.object({ a: z.array(z.string().optional()) }))).toThrow(
        /cannot be optional/,
      );
    });

    it("rejects fields whose absence would be ambiguous", () => {
      expect(() => extractFields(z.object({ force: z.boolean().nullable() }))).toThrow(
        'Field "force": boolean flags cannot be nullable',
      );
      expect(() => extractFields(z.object({ tags: z.array(z.string()).nullable() }))).toThrow(
        'Field "tags": lists cannot be nullable; an absent list is empty',
      );
      expect(() => extractFields(z.object({ tags: z.array(z.string()).default(["x"]) }))).toThrow(
        'Field "tags": lists can only default to []',
      );
      expect(() => extractFields(z.object({ zone: z.string().nullable().default("a") }))).toThrow(
        'Field "zone": nullable fields can only default to null',
      );
    });

    it("accepts the unambiguous forms", () => {
      const fields = extractFields(
        z.object({
          force: z.boolean().optional(),
          tags: z.array(z.string()).default([]),
          zone: z.string().nullable().default(null),
        }),
      );
      expect(fields.map((f) => f.required)).toEqual([false, false, false]);
    });
  });
});
