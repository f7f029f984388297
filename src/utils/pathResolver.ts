/**
 * Path layout under the maskmail home directory (~/.maskmail by default).
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { existsSync, mkdirSync } from "node:fs";

const MASKMAIL_HOME = join(homedir(), ".maskmail");

export function getMaskmailHome(): string {
  return process.env["MASKMAIL_HOME"] ?? MASKMAIL_HOME;
}

export function getConfigPath(): string {
  return join(getMaskmailHome(), "config.json");
}

export function getSessionDir(): string {
  return join(getMaskmailHome(), "session");
}

export function getCredentialsPath(): string {
  return join(getMaskmailHome(), "credentials.enc");
}

export function getLogDir(): string {
  return join(getMaskmailHome(), "logs");
}

// ── Directory Initialization ─────────────────────────────────────────────

export function ensureDirectory(dirPath: string, mode?: number): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true, mode: mode ?? 0o755 });
  }
}

export function ensureSecureDirectory(dirPath: string): void {
  ensureDirectory(dirPath, 0o700);
}

export function initializeDirectories(): void {
  ensureSecureDirectory(getMaskmailHome());
  ensureSecureDirectory(getSessionDir());
}
