/**
 * `maskmail list` — sign in with the stored credentials and print aliases.
 */

import { Command } from "commander";
import pc from "picocolors";
import type { IEmailAlias } from "../../types/index.js";
import { createCliContext } from "../context.js";
import { ask } from "../prompt.js";
import { reportError, EXIT_USAGE } from "../output.js";

function formatAlias(alias: IEmailAlias): string {
  const state = alias.isActive ? pc.green("active  ") : pc.dim("inactive");
  const label = alias.label.length > 0 ? alias.label : pc.dim("(no label)");
  return `  ${state}  ${alias.email}  ${label}`;
}

export function createListCommand(): Command {
  return new Command("list")
    .description("List email aliases")
    .option("-a, --account <account>", "Account to use (defaults to the current account)")
    .option("--inactive", "Include deactivated aliases")
    .action(async (options: { account?: string; inactive?: boolean }) => {
      const service = createCliContext();
      const account = options.account ?? service.config.getDefaultAccount();
      if (account === undefined) {
        process.stderr.write(pc.red("No account configured. Run 'maskmail setup' first.\n"));
        process.exitCode = EXIT_USAGE;
        return;
      }

      try {
        const session = await service.manager.authenticate(account, {
          ...(process.stdin.isTTY
            ? { twoFactorProvider: () => ask("Enter the two-factor code from your device: ") }
            : {}),
        });
        const aliases = (await session.aliases.list()).filter(
          (alias) => options.inactive === true || alias.isActive,
        );

        if (aliases.length === 0) {
          process.stdout.write(pc.yellow("No aliases found.\n"));
          return;
        }
        for (const alias of aliases) {
          process.stdout.write(`${formatAlias(alias)}\n`);
        }
        process.stdout.write(pc.dim(`\n${aliases.length} alias(es)\n`));
      } catch (error: unknown) {
        reportError("Could not list aliases", error);
      }
    });
}
