/**
 * Account flows used by the CLI: first-time setup, logout and status.
 * Setup owns the cleanup after a failed first sign-in; the session manager
 * never deletes credentials on its own.
 */

import type {
  IAccountStatus,
  IRemoteAccountClientFactory,
  ISessionHandle,
  IUserConfig,
  TwoFactorProvider,
} from "../types/index.js";
import { errorMessage } from "../types/index.js";
import { ConfigStore } from "../storage/config-store.js";
import { CredentialStore } from "./credential-store.js";
import { BiometricGate } from "./biometric-gate.js";
import { SessionCache } from "./session-cache.js";
import { AuthSessionManager } from "./session-manager.js";
import { createSecretBackend } from "./secret-backend.js";
import { logger } from "../utils/index.js";

export interface ISetupRequest {
  readonly account: string;
  readonly secret: string;
  readonly twoFactorProvider?: TwoFactorProvider | undefined;
}

export interface ILogoutResult {
  readonly credentialsRemoved: boolean;
  readonly sessionCleared: boolean;
  readonly defaultCleared: boolean;
}

export interface IAccountServiceDeps {
  readonly config: ConfigStore;
  readonly credentials: CredentialStore;
  readonly gate: BiometricGate;
  readonly sessionCache: SessionCache;
  readonly manager: AuthSessionManager;
}

export class AccountService {
  readonly config: ConfigStore;
  readonly credentials: CredentialStore;
  readonly gate: BiometricGate;
  readonly sessionCache: SessionCache;
  readonly manager: AuthSessionManager;

  constructor(deps: IAccountServiceDeps) {
    this.config = deps.config;
    this.credentials = deps.credentials;
    this.gate = deps.gate;
    this.sessionCache = deps.sessionCache;
    this.manager = deps.manager;
  }

  /**
   * Store credentials, make the account the default, and verify them with a
   * first sign-in. A failed sign-in removes everything this call created.
   */
  async setup(request: ISetupRequest): Promise<ISessionHandle> {
    const { account, secret } = request;
    await this.credentials.store(account, secret);
    this.config.setDefaultAccount(account);

    try {
      return await this.manager.authenticate(account, {
        secret,
        twoFactorProvider: request.twoFactorProvider,
      });
    } catch (error: unknown) {
      logger.info({ account, error: errorMessage(error) }, "First sign-in failed, removing stored credentials");
      await this.discard(account);
      throw error;
    }
  }

  async logout(account: string): Promise<ILogoutResult> {
    const credentialsRemoved = await this.credentials.has(account);
    await this.credentials.delete(account);

    const sessionCleared = this.sessionCache.exists(account);
    this.manager.clearSession(account);

    const defaultCleared = this.config.getDefaultAccount() === account;
    if (defaultCleared) {
      this.config.clearDefaultAccount();
    }

    return { credentialsRemoved, sessionCleared, defaultCleared };
  }

  async status(account: string): Promise<IAccountStatus> {
    const credentialsStored = await this.credentials.has(account);
    const sessionValid = await this.manager.isSessionValid(account);
    const biometricAvailable = await this.gate.isAvailable();
    return { account, credentialsStored, sessionValid, biometricAvailable };
  }

  private async discard(account: string): Promise<void> {
    try {
      await this.credentials.delete(account);
    } catch (error: unknown) {
      logger.warn({ account, error: errorMessage(error) }, "Could not remove credentials after failed sign-in");
    }

    try {
      this.manager.clearSession(account);
    } catch (error: unknown) {
      logger.warn({ account, error: errorMessage(error) }, "Could not clear session after failed sign-in");
    }

    try {
      if (this.config.getDefaultAccount() === account) {
        this.config.clearDefaultAccount();
      }
    } catch (error: unknown) {
      logger.warn({ account, error: errorMessage(error) }, "Could not reset default account after failed sign-in");
    }
  }
}

export interface ICreateAccountServiceOptions {
  readonly config?: ConfigStore | undefined;
  readonly clientFactory: IRemoteAccountClientFactory;
}

/**
 * Wire the default stores from the user's configuration.
 */
export function createAccountService(options: ICreateAccountServiceOptions): AccountService {
  const config = options.config ?? new ConfigStore();
  const settings: IUserConfig = config.load();

  const gate = new BiometricGate(undefined, settings.biometricTimeoutMs);
  const credentials = new CredentialStore(createSecretBackend(settings.credentialBackend), gate);
  const sessionCache = new SessionCache();
  const manager = new AuthSessionManager(options.clientFactory, { credentials, sessionCache });

  return new AccountService({ config, credentials, gate, sessionCache, manager });
}
