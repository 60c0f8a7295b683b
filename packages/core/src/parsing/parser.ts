/**
 * Argument parser and coercer.
 *
 * Supported forms, all equivalent:
 *   --retries 3    --retries=3    -r 3
 *
 * Boolean flags consume no token. The token after a value-taking flag is
 * always its value, so `--offset -5` works. Parsing is fail-fast: the first
 * malformed token aborts with a ParseError naming it.
 *
 * A non-repeatable flag given twice keeps the last value; repeatable flags
 * collect values in argv order. Absent flags have no key in the result.
 *
 * `--help` and `-h` are only recognized where a flag may stand, so
 * `--name -h` sets name to "-h".
 */

import { ParseError } from "@paramcli/sdk";
import type { ParameterSpec, ParseOutcome } from "@paramcli/sdk";
import { HELP_FLAGS } from "../synthesis/synthesizer.js";

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type Coerced = { ok: true; value: unknown } | { ok: false; expected: string };

export function parseArgv(specs: readonly ParameterSpec[], argv: readonly string[]): ParseOutcome {
  const byToken = indexSpecs(specs);
  const values: Record<string, unknown> = {};
  const lists = new Map<string, unknown[]>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const { flag, inline } = splitToken(token);

    if (flag !== undefined && isHelpFlag(flag)) {
      if (inline !== undefined) {
        return { ok: false, error: new ParseError(token, `Option ${flag} does not take a value`) };
      }
      return { ok: true, values, help: true };
    }

    const spec = flag === undefined ? undefined : byToken.get(flag);
    if (!spec) {
      const message = flag === undefined
        ? `Unexpected argument "${token}"`
        : `Unknown option "${flag}"`;
      return { ok: false, error: new ParseError(token, message) };
    }

    if (spec.isFlag) {
      if (inline !== undefined) {
        return {
          ok: false,
          error: new ParseError(token, `Option ${spec.flag} does not take a value`, spec.name),
        };
      }
      values[spec.name] = !spec.negated;
      continue;
    }

    let raw = inline;
    if (raw === undefined) {
      if (i + 1 >= argv.length) {
        return {
          ok: false,
          error: new ParseError(token, `Option ${spec.flag} expects a value`, spec.name),
        };
      }
      raw = argv[++i];
    }

    const coerced = coerce(spec, raw);
    if (!coerced.ok) {
      return {
        ok: false,
        error: new ParseError(raw, `Invalid value "${raw}" for ${spec.name}: expected ${coerced.expected}`, spec.name),
      };
    }

    if (spec.multiplicity === "repeatable") {
      const list = lists.get(spec.name) ?? [];
      list.push(coerced.value);
      lists.set(spec.name, list);
      values[spec.name] = list;
    } else {
      values[spec.name] = coerced.value;
    }
  }

  return { ok: true, values };
}

function isHelpFlag(flag: string): boolean {
  return HELP_FLAGS.some((help) => help === flag);
}

function indexSpecs(specs: readonly ParameterSpec[]): Map<string, ParameterSpec> {
  const index = new Map<string, ParameterSpec>();
  for (const spec of specs) {
    index.set(spec.flag, spec);
    if (spec.short !== undefined) index.set(`-${spec.short}`, spec);
  }
  return index;
}

/** `--name=value` → flag and inline value; bare words have no flag. */
function splitToken(token: string): { flag?: string; inline?: string } {
  if (token.startsWith("--")) {
    const eq = token.indexOf("=");
    return eq === -1
      ? { flag: token.toLowerCase() }
      : { flag: token.slice(0, eq).toLowerCase(), inline: token.slice(eq + 1) };
  }
  if (token.startsWith("-") && token.length > 1) {
    return { flag: token };
  }
  return {};
}

function coerce(spec: ParameterSpec, raw: string): Coerced {
  switch (spec.typeTag) {
    case "string":
      return { ok: true, value: raw };
    case "int": {
      const value = Number(raw);
      return INTEGER.test(raw) && Number.isSafeInteger(value)
        ? { ok: true, value }
        : { ok: false, expected: "an integer" };
    }
    case "float": {
      const value = Number(raw);
      return DECIMAL.test(raw) && Number.isFinite(value)
        ? { ok: true, value }
        : { ok: false, expected: "a number" };
    }
    case "choice":
      return matchChoice(spec.choices ?? [], raw);
    case "json":
      return parseJsonObject(raw);
    case "bool":
      return { ok: false, expected: "no value" };
  }
}

/** Case-insensitive match that returns the declared spelling. */
function matchChoice(choices: readonly string[], raw: string): Coerced {
  const folded = raw.toLowerCase();
  const match = choices.find((choice) => choice === raw) ?? choices.find((choice) => choice.toLowerCase() === folded);
  return match === undefined
    ? { ok: false, expected: `one of ${choices.join(", ")}` }
    : { ok: true, value: match };
}

function parseJsonObject(raw: string): Coerced {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, expected: "a JSON object" };
  }
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? { ok: true, value }
    : { ok: false, expected: "a JSON object" };
}
