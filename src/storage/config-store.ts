/**
 * User preferences store — default account, biometric deadline, service URL
 * and credential backend, validated with Zod.
 */

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { getConfigPath, ensureSecureDirectory } from "../utils/pathResolver.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { IUserConfig } from "../types/config.js";
import { InvalidConfigError } from "../types/errors.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const UserConfigSchema = z.object({
  defaultAccount: z.string().min(1).optional(),
  biometricTimeoutMs: z.number().int().positive().optional(),
  serviceUrl: z.string().url().optional(),
  credentialBackend: z.enum(["auto", "keychain", "encrypted-file"]).optional(),
});

export const CONFIG_KEYS = [
  "defaultAccount",
  "biometricTimeoutMs",
  "serviceUrl",
  "credentialBackend",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

export class ConfigStore {
  private readonly configPath: string;
  private current: IUserConfig = DEFAULT_CONFIG;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getConfigPath();
  }

  get config(): IUserConfig {
    return this.current;
  }

  load(): IUserConfig {
    if (!existsSync(this.configPath)) {
      logger.debug({ path: this.configPath }, "Config not found, using defaults");
      this.current = DEFAULT_CONFIG;
      return this.current;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.configPath, "utf-8"));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path: this.configPath, error: message }, "Config is not valid JSON, using defaults");
      this.current = DEFAULT_CONFIG;
      return this.current;
    }

    const validated = UserConfigSchema.safeParse(parsed);
    if (!validated.success) {
      logger.warn(
        { errors: validated.error.issues },
        "Config validation failed, using defaults",
      );
      this.current = DEFAULT_CONFIG;
      return this.current;
    }

    this.current = this.applyDefaults(validated.data);
    logger.debug({ path: this.configPath }, "Config loaded");
    return this.current;
  }

  save(config: IUserConfig): void {
    ensureSecureDirectory(dirname(this.configPath));
    writeFileSync(this.configPath, JSON.stringify(config, null, 2), { encoding: "utf-8", mode: 0o600 });
    this.current = config;
    logger.debug({ path: this.configPath }, "Config saved");
  }

  getDefaultAccount(): string | undefined {
    return this.load().defaultAccount;
  }

  setDefaultAccount(account: string): void {
    this.save({ ...this.load(), defaultAccount: account });
  }

  clearDefaultAccount(): void {
    const { defaultAccount: _removed, ...rest } = this.load();
    this.save(rest);
  }

  /**
   * Set a single key from its command-line string form, validating the
   * resulting config before it is written.
   */
  setValue(key: ConfigKey, raw: string): IUserConfig {
    const value: unknown = key === "biometricTimeoutMs" ? Number(raw) : raw;
    const validated = UserConfigSchema.safeParse({ ...this.load(), [key]: value });
    if (!validated.success) {
      throw new InvalidConfigError(key, validated.error.issues.map((issue) => issue.message).join("; "));
    }
    const next = this.applyDefaults(validated.data);
    this.save(next);
    return next;
  }

  private applyDefaults(partial: z.infer<typeof UserConfigSchema>): IUserConfig {
    return {
      biometricTimeoutMs: partial.biometricTimeoutMs ?? DEFAULT_CONFIG.biometricTimeoutMs,
      credentialBackend: partial.credentialBackend ?? DEFAULT_CONFIG.credentialBackend,
      ...(partial.defaultAccount !== undefined ? { defaultAccount: partial.defaultAccount } : {}),
      ...(partial.serviceUrl !== undefined ? { serviceUrl: partial.serviceUrl } : {}),
    };
  }
}
