#!/usr/bin/env node

/**
 * maskmail — CLI entry point
 */

import { Command } from "commander";
import pc from "picocolors";
import {
  createAuthCommand,
  createSetupCommand,
  createLogoutCommand,
  createStatusCommand,
} from "./commands/auth.js";
import { createListCommand } from "./commands/list.js";
import { createConfigCommand } from "./commands/config.js";
import { initializeDirectories, logger } from "../utils/index.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  initializeDirectories();

  const program = new Command()
    .name("maskmail")
    .description("Manage your private relay email aliases")
    .version(VERSION, "-v, --version");

  program.addCommand(createAuthCommand());

  // Expose the auth commands at the root for convenience
  program.addCommand(createSetupCommand());
  program.addCommand(createLogoutCommand());
  program.addCommand(createStatusCommand());

  program.addCommand(createListCommand());
  program.addCommand(createConfigCommand());

  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof Error) {
      logger.error({ error: error.message }, "CLI error");
      process.stderr.write(pc.red(`Error: ${error.message}\n`));
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  process.stderr.write(
    pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
  );
  process.exit(1);
});
