/**
 * Bootstrap: builds the paramcli command tree.
 *
 * Registration happens once at startup; any schema or flag problem in a
 * command surfaces here, before argv is looked at.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { createCli, type CliOptions, type ParamCli } from "@paramcli/core";
import { registerCommand } from "./commands/base.js";
import { ConfigSetCommand } from "./commands/config-set.js";
import { ConfigShowCommand } from "./commands/config-show.js";
import { DeployCommand } from "./commands/deploy.js";
import { VersionCommand } from "./commands/version.js";
import { ConfigStore } from "./utils/config-store.js";

// ─── Paths ───

export const PARAMCLI_HOME = join(homedir(), ".paramcli");
export const CONFIG_PATH = join(PARAMCLI_HOME, "config.json");

export const PROGRAM_NAME = "paramcli";

export interface BootstrapOptions extends Omit<CliOptions, "programName" | "registry"> {
  /** Settings file for `config show` / `config set`. Default: ~/.paramcli/config.json */
  configPath?: string;
}

export function bootstrap(options: BootstrapOptions = {}): ParamCli {
  const { configPath = CONFIG_PATH, ...cliOptions } = options;
  const cli = createCli({ ...cliOptions, programName: PROGRAM_NAME });
  const store = new ConfigStore(configPath);

  registerCommand(cli, new VersionCommand());
  registerCommand(cli, new ConfigShowCommand(store));
  registerCommand(cli, new ConfigSetCommand(store));
  registerCommand(cli, new DeployCommand());

  cli.seal();
  return cli;
}
