/**
 * Error reporting and exit codes for CLI commands.
 */

import pc from "picocolors";
import { MaskmailError, TwoFactorRequiredError, errorMessage } from "../types/index.js";
import { logger } from "../utils/index.js";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_TWO_FACTOR_REQUIRED = 3;

export function reportError(prefix: string, error: unknown): void {
  if (error instanceof MaskmailError) {
    logger.error({ errorCode: error.code, error: error.message }, prefix);
    process.stderr.write(pc.red(`${prefix}: ${error.userMessage}\n`));
    if (error.suggestedRecovery !== undefined) {
      process.stderr.write(pc.dim(`  ${error.suggestedRecovery}\n`));
    }
    process.exitCode = error instanceof TwoFactorRequiredError ? EXIT_TWO_FACTOR_REQUIRED : EXIT_FAILURE;
    return;
  }

  const message = errorMessage(error);
  logger.error({ error: message }, prefix);
  process.stderr.write(pc.red(`${prefix}: ${message}\n`));
  process.exitCode = EXIT_FAILURE;
}

export function ok(message: string): void {
  process.stdout.write(`${pc.green("✓")} ${message}\n`);
}

export function warn(message: string): void {
  process.stdout.write(`${pc.yellow("!")} ${message}\n`);
}
