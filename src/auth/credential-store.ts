/**
 * Credential storage: one secret per account under a fixed service namespace.
 * Primary: macOS Keychain via the `security` utility
 * Fallback: AES-256-GCM encrypted file
 *
 * Writes are never gated. Reads pass through the biometric gate whenever the
 * gate reports it is available; without Touch ID hardware they read directly.
 */

import {
  CredentialStoreError,
  CredentialsNotFoundError,
  errorMessage,
} from "../types/index.js";
import type { ISecretBackend } from "./secret-backend.js";
import { createSecretBackend } from "./secret-backend.js";
import { BiometricGate } from "./biometric-gate.js";
import { logger } from "../utils/index.js";

export const SERVICE_NAME = "com.maskmail.cli";
export const DEFAULT_UNLOCK_PROMPT = "Authenticate to access account credentials";

function toStoreError(error: unknown): CredentialStoreError {
  if (error instanceof CredentialStoreError) {
    return error;
  }
  return new CredentialStoreError(`Unexpected error: ${errorMessage(error)}`, undefined, { cause: error });
}

export class CredentialStore {
  private readonly backend: ISecretBackend;
  private readonly gate: BiometricGate;
  private readonly service: string;

  constructor(backend?: ISecretBackend, gate?: BiometricGate, service?: string) {
    this.backend = backend ?? createSecretBackend("auto");
    this.gate = gate ?? new BiometricGate();
    this.service = service ?? SERVICE_NAME;
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Store a secret, replacing any existing entry for the account.
   */
  async store(account: string, secret: string): Promise<void> {
    try {
      await this.backend.remove(this.service, account);
    } catch (error: unknown) {
      logger.debug({ account, error: errorMessage(error) }, "Pre-store delete failed, continuing");
    }

    try {
      await this.backend.add(this.service, account, secret);
    } catch (error: unknown) {
      throw toStoreError(error);
    }
    logger.info({ account, backend: this.backend.name }, "Credential stored");
  }

  /**
   * Retrieve a secret, verifying with Touch ID first when it is available.
   * Biometric failures propagate unchanged and nothing is read.
   */
  async get(account: string, promptText: string = DEFAULT_UNLOCK_PROMPT): Promise<string> {
    if (await this.gate.isAvailable()) {
      await this.gate.verify(promptText);
    }

    let secret: string | undefined;
    try {
      secret = await this.backend.find(this.service, account);
    } catch (error: unknown) {
      throw toStoreError(error);
    }

    if (secret === undefined) {
      throw new CredentialsNotFoundError(account);
    }
    return secret;
  }

  /**
   * Delete a secret. Deleting an absent entry succeeds.
   */
  async delete(account: string): Promise<void> {
    try {
      await this.backend.remove(this.service, account);
    } catch (error: unknown) {
      throw toStoreError(error);
    }
    logger.info({ account }, "Credential deleted");
  }

  /**
   * Check whether a secret exists without prompting for Touch ID.
   */
  async has(account: string): Promise<boolean> {
    try {
      return await this.backend.exists(this.service, account);
    } catch (error: unknown) {
      logger.debug({ account, error: errorMessage(error) }, "Credential existence probe failed");
      return false;
    }
  }
}
