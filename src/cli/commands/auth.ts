/**
 * Authentication commands: setup, logout, status.
 * Registered both under `maskmail auth` and at the root for convenience.
 */

import { Command } from "commander";
import pc from "picocolors";
import { createCliContext } from "../context.js";
import { ask, askSecret, confirm } from "../prompt.js";
import { reportError, ok, warn, EXIT_FAILURE, EXIT_USAGE } from "../output.js";

const askTwoFactorCode = (): Promise<string> => ask("Enter the two-factor code from your device: ");

export function createSetupCommand(): Command {
  return new Command("setup")
    .description("Store account credentials in the keychain and verify them")
    .option("-a, --account <account>", "Account identifier (email)")
    .action(async (options: { account?: string }) => {
      process.stdout.write(pc.bold(pc.blue("maskmail setup\n\n")));
      const service = createCliContext();

      if (await service.gate.isAvailable()) {
        ok("Touch ID is available and will be used to unlock credentials");
      } else {
        warn("Touch ID not available. Credentials will be stored without biometric protection.");
        if (!(await confirm("Continue without Touch ID protection?"))) {
          process.stderr.write(pc.yellow("Aborted.\n"));
          process.exitCode = EXIT_FAILURE;
          return;
        }
      }

      const account = options.account ?? (await ask("Account (email): "));
      if (account.length === 0) {
        process.stderr.write(pc.red("An account is required.\n"));
        process.exitCode = EXIT_USAGE;
        return;
      }
      const secret = await askSecret("Password: ");

      process.stdout.write("\nVerifying credentials with the account service...\n");
      try {
        await service.setup({ account, secret, twoFactorProvider: askTwoFactorCode });
      } catch (error: unknown) {
        reportError("Setup failed", error);
        return;
      }

      ok(`Credentials stored securely (${service.credentials.backendName})`);
      ok(`Set ${account} as default account`);
      ok("Signed in and session saved");
      process.stdout.write(pc.green("\nSetup complete.") + " Use 'maskmail list' to see your aliases.\n");
    });
}

export function createLogoutCommand(): Command {
  return new Command("logout")
    .description("Remove stored credentials and session data")
    .option("-a, --account <account>", "Account to remove (defaults to the current account)")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (options: { account?: string; yes?: boolean }) => {
      const service = createCliContext();
      const account = options.account ?? service.config.getDefaultAccount();
      if (account === undefined) {
        process.stdout.write(pc.yellow("No account configured. Nothing to remove.\n"));
        return;
      }

      if (options.yes !== true && !(await confirm(`Remove credentials for ${pc.cyan(account)}?`))) {
        process.stderr.write(pc.yellow("Aborted.\n"));
        process.exitCode = EXIT_FAILURE;
        return;
      }

      try {
        const result = await service.logout(account);
        if (result.credentialsRemoved) {
          ok(`Removed credentials for ${account}`);
        } else {
          process.stdout.write(pc.yellow(`No stored credentials found for ${account}\n`));
        }
        ok(result.sessionCleared ? "Cleared session data" : "No session data to clear");
        if (result.defaultCleared) {
          ok("Cleared default account");
        }
      } catch (error: unknown) {
        reportError("Logout failed", error);
      }
    });
}

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show current authentication status")
    .action(async () => {
      const service = createCliContext();
      const account = service.config.getDefaultAccount();
      if (account === undefined) {
        process.stdout.write(pc.yellow("No account configured.\n"));
        process.stdout.write("Run 'maskmail setup' to configure your account.\n");
        return;
      }

      try {
        const status = await service.status(account);
        process.stdout.write(`Account:     ${pc.cyan(status.account)}\n`);
        process.stdout.write(
          `Credentials: ${status.credentialsStored ? pc.green(`Stored (${service.credentials.backendName})`) : pc.red("Not found")}\n`,
        );
        process.stdout.write(
          `Session:     ${status.sessionValid ? pc.green("Valid") : pc.yellow("Expired or missing")}\n`,
        );
        process.stdout.write(
          `Touch ID:    ${status.biometricAvailable ? pc.green("Available") : pc.yellow("Not available")}\n`,
        );
      } catch (error: unknown) {
        reportError("Status check failed", error);
      }
    });
}

export function createAuthCommand(): Command {
  return new Command("auth")
    .description("Authentication commands")
    .addCommand(createSetupCommand())
    .addCommand(createLogoutCommand())
    .addCommand(createStatusCommand());
}
