/**
 * macOS Keychain backend using the `security` command-line utility.
 *
 * Items are written without a biometric access policy: creating one needs
 * entitlements an unsigned CLI does not have (-34018), so Touch ID is
 * enforced at retrieval time by the credential store instead.
 */

import type { ISecretBackend } from "./secret-backend.js";
import { CredentialStoreError, errorMessage } from "../types/index.js";
import { runCommand, isMissingCommandError } from "../utils/process.js";
import type { CommandRunner, ICommandResult } from "../utils/process.js";
import { SEC_ITEM_NOT_FOUND, describeSecurityStatus } from "./security-status.js";
import { logger } from "../utils/index.js";

const SECURITY_BIN = "/usr/bin/security";
const NOT_FOUND_MARKER = "could not be found";
const STATUS_PATTERN = /\((-\d+)\)/;
const PASSWORD_PREFIX = "password:";
const HEX_PASSWORD_PATTERN = /^0x([0-9A-Fa-f]*)(?:\s|$)/;

function isNotFound(result: ICommandResult): boolean {
  return result.stderr.includes(NOT_FOUND_MARKER);
}

function reportedStatus(result: ICommandResult): number | undefined {
  if (isNotFound(result)) {
    return SEC_ITEM_NOT_FOUND;
  }
  const match = STATUS_PATTERN.exec(result.stderr);
  return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

/**
 * Extract a Security framework status from the utility's stderr.
 * Falls back to the process exit code when none is printed.
 */
export function parseSecurityStatus(result: ICommandResult): number {
  return reportedStatus(result) ?? result.exitCode;
}

/**
 * Decode the `password:` line that `find-generic-password -g` writes to
 * stderr. Printable ASCII data is quoted verbatim; anything else is printed
 * as `0x<HEX>` followed by an escaped rendering.
 */
export function parsePasswordLine(stderr: string): string | undefined {
  const line = stderr.split("\n").find((candidate) => candidate.startsWith(PASSWORD_PREFIX));
  if (line === undefined) {
    return undefined;
  }

  const value = line.slice(PASSWORD_PREFIX.length).replace(/^ /, "");
  if (value.trim().length === 0) {
    return "";
  }
  const hex = HEX_PASSWORD_PATTERN.exec(value);
  if (hex?.[1] !== undefined) {
    return Buffer.from(hex[1], "hex").toString("utf-8");
  }
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return undefined;
}

function toStoreError(operation: string, result: ICommandResult): CredentialStoreError {
  const stderr = result.stderr.trim();
  const status = reportedStatus(result);
  const message = status !== undefined
    ? describeSecurityStatus(status)
    : stderr.length > 0
      ? `security command failed: ${stderr}`
      : `security command failed with code ${result.exitCode}`;

  return new CredentialStoreError(message, status, {
    diagnosticMessage: `${operation}: ${stderr || `exit code ${result.exitCode}`}`,
  });
}

export class SecurityCliBackend implements ISecretBackend {
  readonly name = "keychain";
  private readonly run: CommandRunner;

  constructor(runner?: CommandRunner) {
    this.run = runner ?? runCommand;
  }

  async add(service: string, account: string, secret: string): Promise<void> {
    // Hex keeps every byte intact, whatever the secret contains
    const result = await this.exec("add-generic-password", [
      "-s", service, "-a", account, "-X", Buffer.from(secret, "utf-8").toString("hex"), "-U",
    ]);
    if (result.exitCode !== 0) {
      throw toStoreError("add-generic-password", result);
    }
    logger.debug({ account }, "Keychain item written");
  }

  async find(service: string, account: string): Promise<string | undefined> {
    const result = await this.exec("find-generic-password", ["-s", service, "-a", account, "-g"]);
    if (result.exitCode === 0) {
      const secret = parsePasswordLine(result.stderr);
      if (secret === undefined) {
        throw new CredentialStoreError("security command returned no password data", undefined, {
          diagnosticMessage: `find-generic-password: ${result.stderr.trim() || "empty output"}`,
        });
      }
      return secret;
    }
    if (isNotFound(result)) {
      return undefined;
    }
    throw toStoreError("find-generic-password", result);
  }

  async remove(service: string, account: string): Promise<void> {
    const result = await this.exec("delete-generic-password", ["-s", service, "-a", account]);
    if (result.exitCode === 0 || isNotFound(result)) {
      return;
    }
    throw toStoreError("delete-generic-password", result);
  }

  async exists(service: string, account: string): Promise<boolean> {
    const result = await this.exec("find-generic-password", ["-s", service, "-a", account]);
    return result.exitCode === 0;
  }

  private async exec(subcommand: string, args: readonly string[]): Promise<ICommandResult> {
    try {
      return await this.run(SECURITY_BIN, [subcommand, ...args]);
    } catch (error: unknown) {
      if (isMissingCommandError(error)) {
        throw new CredentialStoreError(`${SECURITY_BIN} command not found`, undefined, {
          cause: error,
          suggestedRecovery: "Use the encrypted-file credential backend on this platform.",
        });
      }
      throw new CredentialStoreError(`Unexpected error: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }
}
