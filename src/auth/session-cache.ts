/**
 * Durable per-account session artifacts under <home>/session/<account>.
 * An artifact is an opaque blob exported by the remote client; it may be a
 * single file or, for clients that keep several files, a directory.
 */

import { existsSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ISessionArtifact } from "../types/index.js";
import { InvalidAccountError } from "../types/index.js";
import { getSessionDir, ensureSecureDirectory, logger } from "../utils/index.js";

const DIRECTORY_ARTIFACT_FILE = "session.json";

export function validateAccountName(account: string): void {
  if (account.trim().length === 0) {
    throw new InvalidAccountError(account, "must not be empty");
  }
  if (account.includes("/") || account.includes("\\")) {
    throw new InvalidAccountError(account, "must not contain path separators");
  }
  if (account === "." || account === "..") {
    throw new InvalidAccountError(account, "is not a valid name");
  }
}

export class SessionCache {
  private readonly rootDir: string;

  constructor(rootDir?: string) {
    this.rootDir = rootDir ?? getSessionDir();
  }

  locate(account: string): ISessionArtifact {
    validateAccountName(account);
    return { account, location: join(this.rootDir, account) };
  }

  exists(account: string): boolean {
    return existsSync(this.locate(account).location);
  }

  read(account: string): string | undefined {
    const { location } = this.locate(account);
    if (!existsSync(location)) {
      return undefined;
    }

    const target = statSync(location).isDirectory()
      ? join(location, DIRECTORY_ARTIFACT_FILE)
      : location;
    if (!existsSync(target)) {
      return undefined;
    }
    return readFileSync(target, "utf-8");
  }

  write(account: string, blob: string): ISessionArtifact {
    const artifact = this.locate(account);
    ensureSecureDirectory(this.rootDir);

    if (existsSync(artifact.location) && statSync(artifact.location).isDirectory()) {
      writeFileSync(join(artifact.location, DIRECTORY_ARTIFACT_FILE), blob, { encoding: "utf-8", mode: 0o600 });
    } else {
      writeFileSync(artifact.location, blob, { encoding: "utf-8", mode: 0o600 });
    }

    logger.debug({ account }, "Session artifact written");
    return artifact;
  }

  clear(account: string): void {
    const { location } = this.locate(account);
    if (!existsSync(location)) {
      return;
    }
    rmSync(location, { recursive: true, force: true });
    logger.info({ account }, "Session artifact removed");
  }
}
