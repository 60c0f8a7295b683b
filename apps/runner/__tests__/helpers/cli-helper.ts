/**
 * CliTestHelper: runs the CLI in process and captures its output.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { HandlerContext } from "@paramcli/sdk";
import { createLogger } from "@paramcli/shared";
import { run, type RunOptions } from "../../src/runner.js";

export interface CliRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CliTestHelper {
  readonly configPath: string;
  /** Runs with stdout treated as a pipe unless `isTTY` says otherwise. */
  run(args: string[], env?: NodeJS.ProcessEnv, options?: Pick<RunOptions, "signal" | "isTTY">): CliRun;
  cleanup(): void;
}

export function createCliHelper(): CliTestHelper {
  const dir = mkdtempSync(join(tmpdir(), "paramcli-test-"));
  const configPath = join(dir, "config.json");

  return {
    configPath,

    run(args, env = {}, options = {}) {
      const stdout: string[] = [];
      const stderr: string[] = [];
      const exitCode = run(args, {
        env,
        configPath,
        signal: options.signal,
        isTTY: options.isTTY ?? false,
        io: {
          stdout: (text) => stdout.push(text),
          stderr: (text) => stderr.push(text),
        },
      });
      return { exitCode, stdout: stdout.join("\n"), stderr: stderr.join("\n") };
    },

    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Handler context for calling a command's `handle` directly. */
export function createTestContext(command: string, signal: AbortSignal = new AbortController().signal): HandlerContext {
  return { command, signal, logger: createLogger("test", { level: "error" }) };
}
