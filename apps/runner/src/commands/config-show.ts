/**
 * Config show command - print stored settings.
 */

import { z } from "zod";
import { failure, success } from "@paramcli/sdk";
import type { ExecutionResult } from "@paramcli/sdk";
import { configKeys, type ConfigStore } from "../utils/config-store.js";
import type { CliCommand } from "./base.js";

export const ConfigShowSchema = z.object({
  key: z.enum(configKeys).optional().describe("Show a single setting"),
});

export type ConfigShowInput = z.infer<typeof ConfigShowSchema>;

export class ConfigShowCommand implements CliCommand<ConfigShowInput> {
  readonly name = "config show";
  readonly description = "Show stored settings";
  readonly schema = ConfigShowSchema;

  constructor(private readonly store: ConfigStore) {}

  handle(input: Readonly<ConfigShowInput>): ExecutionResult {
    if (input.key === undefined) {
      const all = this.store.read();
      const sorted = Object.fromEntries(Object.entries(all).sort(([a], [b]) => a.localeCompare(b)));
      return success(sorted);
    }

    const value = this.store.get(input.key);
    if (value === undefined) {
      return failure(`Setting "${input.key}" is not set`);
    }
    return success({ [input.key]: value });
  }
}
