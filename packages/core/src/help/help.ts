/**
 * Help text, derived mechanically from the same ParameterSpec list the
 * parser uses.
 */

import type { CommandRegistration, ParameterSpec } from "@paramcli/sdk";

const HELP_ROW: [string, string] = ["-h, --help", "Show this help message"];

export function renderHelp(registration: CommandRegistration, programName: string): string {
  const lines = [`Usage: ${programName} ${registration.name} [options]`, ""];
  if (registration.description) {
    lines.push(registration.description, "");
  }
  lines.push("Options:");
  lines.push(...columns([...registration.parameters.map(optionRow), HELP_ROW]));
  return lines.join("\n");
}

/** Listing for a bare group such as "config". */
export function renderGroupHelp(
  group: string,
  commands: readonly CommandRegistration[],
  programName: string,
): string {
  return [
    `Usage: ${programName} ${group} <command> [options]`,
    "",
    "Commands:",
    ...columns(commands.map(commandRow)),
    "",
    `Run "${programName} ${group} <command> --help" for command options.`,
  ].join("\n");
}

export function renderOverview(commands: readonly CommandRegistration[], programName: string): string {
  return [
    `Usage: ${programName} <command> [options]`,
    "",
    "Commands:",
    ...columns(commands.map(commandRow)),
    "",
    `Run "${programName} <command> --help" for command options.`,
  ].join("\n");
}

function commandRow(registration: CommandRegistration): [string, string] {
  return [registration.name, registration.description];
}

function optionRow(spec: ParameterSpec): [string, string] {
  const names = spec.short !== undefined ? `-${spec.short}, ${spec.flag}` : spec.flag;
  const repeat = spec.multiplicity === "repeatable" ? "..." : "";
  const left = spec.isFlag ? names : `${names} ${placeholder(spec)}${repeat}`;

  const notes: string[] = [];
  if (spec.help) notes.push(spec.help);
  if (spec.required) notes.push("(required)");
  // A flag's default is whatever leaving it out gives: false, or true for --no-<name>.
  if (spec.isFlag) notes.push(`[default: ${String(spec.negated)}]`);
  else if (spec.hasDefault) notes.push(`[default: ${JSON.stringify(spec.defaultValue)}]`);
  if (spec.multiplicity === "repeatable") notes.push("(repeatable)");

  return [left, notes.join(" ")];
}

function placeholder(spec: ParameterSpec): string {
  if (spec.typeTag === "choice" && spec.choices) return `<${spec.choices.join("|")}>`;
  return `<${spec.typeTag}>`;
}

function columns(rows: readonly [string, string][]): string[] {
  const width = Math.max(0, ...rows.map(([left]) => left.length));
  return rows.map(([left, right]) => `  ${left.padEnd(width)}  ${right}`.trimEnd());
}
