/**
 * Configuration management commands
 */

import { Command } from "commander";
import pc from "picocolors";
import { ConfigStore, CONFIG_KEYS, isConfigKey } from "../../storage/config-store.js";
import { reportError, EXIT_USAGE } from "../output.js";

export function createConfigCommand(): Command {
  const config = new Command("config")
    .description("Configuration management");

  config
    .command("get [key]")
    .description("Get configuration value (or all if no key)")
    .action((key: string | undefined) => {
      const cfg = new ConfigStore().load();

      if (key === undefined) {
        process.stdout.write(JSON.stringify(cfg, null, 2) + "\n");
        return;
      }
      if (!isConfigKey(key)) {
        process.stderr.write(pc.red(`Unknown configuration key: ${key}. Valid: ${CONFIG_KEYS.join(", ")}\n`));
        process.exitCode = EXIT_USAGE;
        return;
      }
      const value = cfg[key];
      if (value === undefined) {
        process.stderr.write(pc.yellow(`${key} is not set\n`));
        return;
      }
      process.stdout.write(`${key} = ${JSON.stringify(value)}\n`);
    });

  config
    .command("set <key> <value>")
    .description("Set a configuration value")
    .action((key: string, value: string) => {
      if (!isConfigKey(key)) {
        process.stderr.write(pc.red(`Unknown configuration key: ${key}. Valid: ${CONFIG_KEYS.join(", ")}\n`));
        process.exitCode = EXIT_USAGE;
        return;
      }
      try {
        const next = new ConfigStore().setValue(key, value);
        process.stdout.write(pc.green(`Set ${key} = ${JSON.stringify(next[key])}\n`));
      } catch (error: unknown) {
        reportError("Failed to set config", error);
      }
    });

  return config;
}
