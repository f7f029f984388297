/**
 * In-process stand-ins for the keychain, the Touch ID platform and the
 * remote account service.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
  IAliasOperations,
  IEmailAlias,
  ILoginResult,
  IRemoteAccountClient,
  IRemoteAccountClientFactory,
} from "../types/index.js";
import { LoginRejectedError } from "../types/index.js";
import type { ISecretBackend } from "../auth/secret-backend.js";
import type {
  BiometricReplyCallback,
  IBiometricPlatform,
  IBiometricProbe,
} from "../auth/biometric-gate.js";

// ── Filesystem ──────────────────────────────────────────────────────────

export interface ITempDir {
  readonly path: string;
  cleanup(): void;
}

export function createTempDir(prefix = "maskmail-test-"): ITempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}

// ── Secret Backend ──────────────────────────────────────────────────────

export class InMemorySecretBackend implements ISecretBackend {
  readonly name = "memory";
  readonly entries = new Map<string, string>();
  readonly operations: string[] = [];
  findCalls = 0;
  addCalls = 0;
  addError: Error | undefined;
  removeError: Error | undefined;

  async add(service: string, account: string, secret: string): Promise<void> {
    this.addCalls++;
    this.operations.push("add");
    if (this.addError !== undefined) {
      throw this.addError;
    }
    this.entries.set(`${service}/${account}`, secret);
  }

  async find(service: string, account: string): Promise<string | undefined> {
    this.findCalls++;
    return this.entries.get(`${service}/${account}`);
  }

  async remove(service: string, account: string): Promise<void> {
    this.operations.push("remove");
    if (this.removeError !== undefined) {
      throw this.removeError;
    }
    this.entries.delete(`${service}/${account}`);
  }

  async exists(service: string, account: string): Promise<boolean> {
    return this.entries.has(`${service}/${account}`);
  }
}

// ── Biometric Platform ──────────────────────────────────────────────────

export type FakeBiometricBehavior = "grant" | "deny" | "hang";

export class FakeBiometricPlatform implements IBiometricPlatform {
  available: boolean;
  behavior: FakeBiometricBehavior;
  probeCalls = 0;
  evaluateCalls = 0;
  lastReason: string | undefined;
  lastSignal: AbortSignal | undefined;

  constructor(available = true, behavior: FakeBiometricBehavior = "grant") {
    this.available = available;
    this.behavior = behavior;
  }

  async canEvaluate(): Promise<IBiometricProbe> {
    this.probeCalls++;
    return this.available ? { available: true } : { available: false, error: "Biometry is not enrolled" };
  }

  evaluate(reason: string, reply: BiometricReplyCallback, signal: AbortSignal): void {
    this.evaluateCalls++;
    this.lastReason = reason;
    this.lastSignal = signal;
    switch (this.behavior) {
      case "grant":
        setTimeout(() => reply({ success: true }), 0);
        return;
      case "deny":
        setTimeout(() => reply({ success: false, error: "User canceled" }), 0);
        return;
      case "hang":
        return;
    }
  }
}

// ── Remote Account Service ──────────────────────────────────────────────

export interface IFakeAccountServiceOptions {
  readonly password: string;
  readonly twoFactorCode?: string | undefined;
  /** Service marks the session trusted as soon as the code is validated. */
  readonly trustOnValidation?: boolean | undefined;
  readonly loginError?: Error | undefined;
  readonly aliases?: readonly IEmailAlias[] | undefined;
}

interface IFakeSessionState {
  trusted: boolean;
}

function parseFakeSession(persisted: string | undefined): IFakeSessionState {
  if (persisted === undefined) {
    return { trusted: false };
  }
  const parsed: unknown = JSON.parse(persisted);
  const trusted = typeof parsed === "object" && parsed !== null && "trusted" in parsed && parsed.trusted === true;
  return { trusted };
}

export class FakeAccountClient implements IRemoteAccountClient {
  readonly aliases: IAliasOperations;
  private readonly service: FakeAccountService;
  private readonly session: IFakeSessionState;

  constructor(service: FakeAccountService, persisted: string | undefined) {
    this.service = service;
    this.session = parseFakeSession(persisted);
    this.aliases = {
      list: async () => service.options.aliases ?? [],
    };
  }

  async login(_account: string, secret: string): Promise<ILoginResult> {
    this.service.loginCalls++;
    if (this.service.options.loginError !== undefined) {
      throw this.service.options.loginError;
    }
    if (secret !== this.service.options.password) {
      throw new LoginRejectedError("Invalid email or password", 401);
    }
    const requiresTwoFactor = this.service.options.twoFactorCode !== undefined && !this.session.trusted;
    return { requiresTwoFactor };
  }

  async validateTwoFactorCode(code: string): Promise<boolean> {
    this.service.validateCalls++;
    const valid = code === this.service.options.twoFactorCode;
    if (valid && this.service.options.trustOnValidation === true) {
      this.session.trusted = true;
    }
    return valid;
  }

  async isTrustedSession(): Promise<boolean> {
    return this.session.trusted;
  }

  async trustSession(): Promise<void> {
    this.service.trustCalls++;
    this.session.trusted = true;
  }

  async exportSession(): Promise<string> {
    return JSON.stringify({ trusted: this.session.trusted });
  }
}

export class FakeAccountService implements IRemoteAccountClientFactory {
  readonly options: IFakeAccountServiceOptions;
  readonly createdWith: Array<string | undefined> = [];
  loginCalls = 0;
  validateCalls = 0;
  trustCalls = 0;

  constructor(options: IFakeAccountServiceOptions) {
    this.options = options;
  }

  create(_account: string, persistedSession?: string): IRemoteAccountClient {
    this.createdWith.push(persistedSession);
    return new FakeAccountClient(this, persistedSession);
  }
}
