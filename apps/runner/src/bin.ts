#!/usr/bin/env node

/**
 * paramcli entry point.
 *
 *   paramcli [-v | -q] [-o <format>] [-c <file>] [--debug] <command> ...
 *   paramcli version [--verbose]
 *   paramcli config show [--key <key>]
 *   paramcli config set --key <key> --value <value>
 *   paramcli deploy --name <service> [options]
 *
 * Run `paramcli --help` or `paramcli <command> --help` for details.
 */

import { run } from "./runner.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

try {
  process.exitCode = run(process.argv.slice(2), { signal: controller.signal });
} catch (err) {
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
