/**
 * Config set command - change one stored setting.
 */

import { z } from "zod";
import { success } from "@paramcli/sdk";
import type { ExecutionResult, HandlerContext } from "@paramcli/sdk";
import { configKeys, type ConfigStore } from "../utils/config-store.js";
import type { CliCommand } from "./base.js";

export const ConfigSetSchema = z.object({
  key: z.enum(configKeys).describe("Setting to change"),
  value: z.string().min(1).max(200).describe("New value"),
});

export type ConfigSetInput = z.infer<typeof ConfigSetSchema>;

export class ConfigSetCommand implements CliCommand<ConfigSetInput> {
  readonly name = "config set";
  readonly description = "Change a stored setting";
  readonly schema = ConfigSetSchema;

  constructor(private readonly store: ConfigStore) {}

  handle(input: Readonly<ConfigSetInput>, ctx: HandlerContext): ExecutionResult {
    const previous = this.store.get(input.key);
    this.store.set(input.key, input.value);
    ctx.logger.info("Setting updated", { key: input.key, path: this.store.path });
    return success({ key: input.key, value: input.value, previous: previous ?? null });
  }
}
