/**
 * Secret storage backends behind the credential store.
 * Backends never gate on biometrics; the credential store decides that.
 */

import type { CredentialBackendKind } from "../types/index.js";
import { SecurityCliBackend } from "./keychain-backend.js";
import { EncryptedFileBackend } from "./encrypted-file-backend.js";

export interface ISecretBackend {
  readonly name: string;
  /** Adds or updates the entry. Throws CredentialStoreError on failure. */
  add(service: string, account: string, secret: string): Promise<void>;
  /** Returns undefined when no entry exists. */
  find(service: string, account: string): Promise<string | undefined>;
  /** Succeeds when the entry is already absent. */
  remove(service: string, account: string): Promise<void>;
  exists(service: string, account: string): Promise<boolean>;
}

export function createSecretBackend(
  kind: CredentialBackendKind,
  platform: NodeJS.Platform = process.platform,
): ISecretBackend {
  switch (kind) {
    case "keychain":
      return new SecurityCliBackend();
    case "encrypted-file":
      return new EncryptedFileBackend();
    case "auto":
      return platform === "darwin" ? new SecurityCliBackend() : new EncryptedFileBackend();
  }
}
