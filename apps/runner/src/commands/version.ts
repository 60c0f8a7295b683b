/**
 * Version command - display version information.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { failure, success } from "@paramcli/sdk";
import type { ExecutionResult, HandlerContext } from "@paramcli/sdk";
import { cliField } from "@paramcli/core";
import { validateInput } from "@paramcli/shared";
import type { CliCommand } from "./base.js";

/** Nearest package.json above this module, from the sources or from dist/. */
function findPackageJson(start: string): string | undefined {
  let dir = start;
  for (;;) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

const PackageInfoSchema = z.object({ version: z.string() });

export const VersionSchema = z.object({
  verbose: cliField(z.boolean().default(false), { short: "v", help: "Include runtime details" }),
});

export type VersionInput = z.infer<typeof VersionSchema>;

export class VersionCommand implements CliCommand<VersionInput> {
  readonly name = "version";
  readonly description = "Display version information";
  readonly schema = VersionSchema;

  constructor(
    private readonly packagePath = findPackageJson(dirname(fileURLToPath(import.meta.url))),
  ) {}

  handle(input: Readonly<VersionInput>, ctx: HandlerContext): ExecutionResult {
    if (this.packagePath === undefined) {
      return failure("Failed to read version information");
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.packagePath, "utf-8"));
    } catch (err) {
      ctx.logger.error("Failed to read package.json", {
        error: err instanceof Error ? err.message : String(err),
      });
      return failure("Failed to read version information");
    }

    const pkg = validateInput(PackageInfoSchema, raw);
    if (!pkg.success) {
      return failure(`Invalid package.json: ${pkg.error}`);
    }

    if (!input.verbose) {
      return success({ version: pkg.data.version });
    }
    return success({
      version: pkg.data.version,
      node: process.version,
      platform: `${process.platform} ${process.arch}`,
    });
  }
}
