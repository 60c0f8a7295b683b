/**
 * Settings file behind `config show` and `config set`.
 *
 * Synchronous, like the handlers that use it. Every call reads or writes
 * the whole file.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { HandlerFailure } from "@paramcli/sdk";
import { validateInput } from "@paramcli/shared";

export const configKeys = ["region", "endpoint", "owner", "namespace"] as const;
export type ConfigKey = (typeof configKeys)[number];

const StoredConfigSchema = z.record(z.string(), z.string());

export type StoredConfig = Record<string, string>;

export class ConfigStore {
  constructor(readonly path: string) {}

  read(): StoredConfig {
    if (!existsSync(this.path)) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (err) {
      throw new HandlerFailure(`Config file ${this.path} is not valid JSON`, 1, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = validateInput(StoredConfigSchema, raw);
    if (!parsed.success) {
      throw new HandlerFailure(`Config file ${this.path} is invalid: ${parsed.error}`);
    }
    return parsed.data;
  }

  get(key: ConfigKey): string | undefined {
    return this.read()[key];
  }

  set(key: ConfigKey, value: string): StoredConfig {
    const next = { ...this.read(), [key]: value };
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(next, null, 2) + "\n", "utf-8");
    return next;
  }
}
