/**
 * Encrypted file backend for platforms without the macOS `security` utility.
 * AES-256-GCM over a JSON map of service/account → secret, keyed by scrypt
 * with a fresh random salt on every write.
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto";
import { readFileSync, writeFileSync, existsSync, chmodSync, unlinkSync } from "node:fs";
import { dirname } from "node:path";
import type { ISecretBackend } from "./secret-backend.js";
import { CredentialStoreError, errorMessage } from "../types/index.js";
import { getCredentialsPath, ensureSecureDirectory, logger } from "../utils/index.js";

const ALGORITHM = "aes-256-gcm";
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const TAG_LENGTH = 16;
const SALT_LENGTH = 32;

type SecretMap = Record<string, string>;

function entryKey(service: string, account: string): string {
  return `${service}\u0000${account}`;
}

function isSecretMap(value: unknown): value is SecretMap {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((entry) => typeof entry === "string");
}

function defaultPassphrase(): string {
  const user = process.env["USER"] ?? process.env["USERNAME"] ?? "maskmail";
  const home = process.env["HOME"] ?? process.env["USERPROFILE"] ?? "/";
  return `maskmail-${user}-${home}`;
}

export interface IEncryptedFileBackendOptions {
  readonly filePath?: string | undefined;
  readonly passphrase?: string | undefined;
}

export class EncryptedFileBackend implements ISecretBackend {
  readonly name = "encrypted-file";
  private readonly filePath: string;
  private readonly passphrase: string;

  constructor(options: IEncryptedFileBackendOptions = {}) {
    this.filePath = options.filePath ?? getCredentialsPath();
    this.passphrase = options.passphrase ?? defaultPassphrase();
  }

  async add(service: string, account: string, secret: string): Promise<void> {
    const entries = this.load();
    entries[entryKey(service, account)] = secret;
    this.save(entries);
    logger.debug({ account }, "Credential written to encrypted file");
  }

  async find(service: string, account: string): Promise<string | undefined> {
    return this.load()[entryKey(service, account)];
  }

  async remove(service: string, account: string): Promise<void> {
    if (!existsSync(this.filePath)) {
      return;
    }
    const entries = this.load();
    const key = entryKey(service, account);
    if (!(key in entries)) {
      return;
    }
    delete entries[key];
    if (Object.keys(entries).length === 0) {
      unlinkSync(this.filePath);
      return;
    }
    this.save(entries);
  }

  async exists(service: string, account: string): Promise<boolean> {
    return (await this.find(service, account)) !== undefined;
  }

  // ── File Format ─────────────────────────────────────────────────────────

  private load(): SecretMap {
    if (!existsSync(this.filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.decryptFile());
    } catch (error: unknown) {
      throw new CredentialStoreError("Encrypted credential file could not be decrypted", undefined, {
        cause: error,
        diagnosticMessage: errorMessage(error),
        suggestedRecovery: `Delete ${this.filePath} and run 'maskmail setup' again.`,
      });
    }

    if (!isSecretMap(parsed)) {
      throw new CredentialStoreError("Encrypted credential file has an unexpected format", undefined, {
        suggestedRecovery: `Delete ${this.filePath} and run 'maskmail setup' again.`,
      });
    }
    return parsed;
  }

  private save(entries: SecretMap): void {
    try {
      ensureSecureDirectory(dirname(this.filePath));
      this.encryptFile(JSON.stringify(entries));
      chmodSync(this.filePath, 0o600);
    } catch (error: unknown) {
      throw new CredentialStoreError(`Failed to write encrypted credential file: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }

  private deriveKey(salt: Buffer): Buffer {
    return scryptSync(this.passphrase, salt, KEY_LENGTH, {
      N: 32768,
      r: 8,
      p: 1,
      maxmem: 64 * 1024 * 1024,
    });
  }

  private encryptFile(plaintext: string): void {
    const salt = randomBytes(SALT_LENGTH);
    const key = this.deriveKey(salt);
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
    const tag = cipher.getAuthTag();

    // salt(32) + iv(16) + tag(16) + ciphertext
    writeFileSync(this.filePath, Buffer.concat([salt, iv, tag, encrypted]), { mode: 0o600 });
  }

  private decryptFile(): string {
    const content = readFileSync(this.filePath);
    if (content.length < SALT_LENGTH + IV_LENGTH + TAG_LENGTH) {
      throw new Error("credential file is truncated");
    }

    const salt = content.subarray(0, SALT_LENGTH);
    const iv = content.subarray(SALT_LENGTH, SALT_LENGTH + IV_LENGTH);
    const tag = content.subarray(SALT_LENGTH + IV_LENGTH, SALT_LENGTH + IV_LENGTH + TAG_LENGTH);
    const encrypted = content.subarray(SALT_LENGTH + IV_LENGTH + TAG_LENGTH);

    const decipher = createDecipheriv(ALGORITHM, this.deriveKey(salt), iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString("utf-8");
  }
}
