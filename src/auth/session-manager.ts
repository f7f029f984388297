/**
 * Authentication session lifecycle.
 *
 * unauthenticated → resolving_credential → attempting_login
 *   → awaiting_two_factor → trusting → authenticated
 * with `failed` reachable from every step. Steps run strictly in that order
 * and nothing is retried; callers decide whether to try again.
 */

import type {
  AuthOutcome,
  AuthState,
  IAuthenticateOptions,
  ILoginResult,
  IRemoteAccountClient,
  IRemoteAccountClientFactory,
  ISessionHandle,
} from "../types/index.js";
import {
  AuthError,
  AuthenticationRejectedError,
  CredentialsNotFoundError,
  LoginRejectedError,
  MaskmailError,
  TwoFactorRequiredError,
  errorMessage,
  isBiometricError,
} from "../types/index.js";
import { CredentialStore } from "./credential-store.js";
import { SessionCache } from "./session-cache.js";
import { toAuthOutcome } from "./auth-outcome.js";
import { logger } from "../utils/index.js";

const UNLOCK_PROMPT = "Authenticate to access account credentials";
const CHECK_PROMPT = "Check account session";

export type StateChangeListener = (state: AuthState, account: string) => void;

export interface IAuthSessionManagerOptions {
  readonly credentials?: CredentialStore | undefined;
  readonly sessionCache?: SessionCache | undefined;
  readonly onStateChange?: StateChangeListener | undefined;
}

/**
 * Re-express a failure from the remote client in the auth taxonomy.
 * Errors already in the taxonomy pass through unchanged.
 */
function fromRemoteFailure(error: unknown, action: string): MaskmailError {
  if (error instanceof LoginRejectedError) {
    return new AuthenticationRejectedError(error.message, error.statusCode, { cause: error });
  }
  if (error instanceof MaskmailError) {
    return error;
  }
  return new AuthError(`${action} failed: ${errorMessage(error)}`, { cause: error });
}

export class AuthSessionManager {
  private readonly clientFactory: IRemoteAccountClientFactory;
  private readonly credentials: CredentialStore;
  private readonly sessionCache: SessionCache;
  private readonly onStateChange: StateChangeListener | undefined;
  private currentState: AuthState = "unauthenticated";

  constructor(clientFactory: IRemoteAccountClientFactory, options: IAuthSessionManagerOptions = {}) {
    this.clientFactory = clientFactory;
    this.credentials = options.credentials ?? new CredentialStore();
    this.sessionCache = options.sessionCache ?? new SessionCache();
    this.onStateChange = options.onStateChange;
  }

  get state(): AuthState {
    return this.currentState;
  }

  /**
   * Sign in to the account service and persist the session artifact.
   * Without an explicit secret, the stored credential is unlocked first.
   */
  async authenticate(account: string, options: IAuthenticateOptions = {}): Promise<ISessionHandle> {
    try {
      const secret = options.secret ?? (await this.resolveCredential(account));

      this.transition("attempting_login", account);
      const client = this.clientFactory.create(account, this.sessionCache.read(account));
      const result: ILoginResult = await this.callRemote("Login", () => client.login(account, secret));

      if (result.requiresTwoFactor) {
        await this.completeTwoFactor(account, client, options);
      }

      const blob = await this.callRemote("Session export", () => client.exportSession());
      this.sessionCache.write(account, blob);
      this.transition("authenticated", account);
      logger.info({ account, twoFactor: result.requiresTwoFactor }, "Authenticated");

      return { account, aliases: client.aliases };
    } catch (error: unknown) {
      this.transition("failed", account);
      const failure = error instanceof MaskmailError
        ? error
        : new AuthError(errorMessage(error), { cause: error });
      logger.info({ account, errorCode: failure.code, error: failure.message }, "Authentication failed");
      throw failure;
    }
  }

  /**
   * Same as authenticate(), reporting failures as a value instead of throwing.
   */
  async authenticateOutcome(account: string, options: IAuthenticateOptions = {}): Promise<AuthOutcome> {
    try {
      const session = await this.authenticate(account, options);
      return { status: "authenticated", session };
    } catch (error: unknown) {
      return toAuthOutcome(error);
    }
  }

  /**
   * Best-effort check that the stored credentials and session artifact still
   * sign in without a fresh two-factor challenge. Never throws.
   */
  async isSessionValid(account: string): Promise<boolean> {
    try {
      if (!(await this.credentials.has(account))) {
        return false;
      }
      if (!this.sessionCache.exists(account)) {
        return false;
      }

      const secret = await this.credentials.get(account, CHECK_PROMPT);
      const client = this.clientFactory.create(account, this.sessionCache.read(account));
      const result = await client.login(account, secret);
      return !result.requiresTwoFactor;
    } catch (error: unknown) {
      logger.debug({ account, error: errorMessage(error) }, "Session validity check failed");
      return false;
    }
  }

  /**
   * Remove the session artifact. Stored credentials are left untouched.
   */
  clearSession(account: string): void {
    this.sessionCache.clear(account);
    this.transition("unauthenticated", account);
  }

  // ── Steps ───────────────────────────────────────────────────────────────

  private async resolveCredential(account: string): Promise<string> {
    this.transition("resolving_credential", account);
    try {
      return await this.credentials.get(account, UNLOCK_PROMPT);
    } catch (error: unknown) {
      if (isBiometricError(error)) {
        throw new CredentialsNotFoundError(account, {
          cause: error,
          diagnosticMessage: error.message,
          suggestedRecovery: error.suggestedRecovery,
        });
      }
      throw error;
    }
  }

  private async completeTwoFactor(
    account: string,
    client: IRemoteAccountClient,
    options: IAuthenticateOptions,
  ): Promise<void> {
    this.transition("awaiting_two_factor", account);
    if (options.twoFactorProvider === undefined) {
      throw new TwoFactorRequiredError(account);
    }

    const code = (await options.twoFactorProvider()).trim();
    const valid = await this.callRemote("Two-factor verification", () => client.validateTwoFactorCode(code));
    if (!valid) {
      throw new AuthenticationRejectedError("Invalid two-factor code");
    }

    this.transition("trusting", account);
    const trusted = await this.callRemote("Trust check", () => client.isTrustedSession());
    if (!trusted) {
      await this.callRemote("Session trust", () => client.trustSession());
      logger.info({ account }, "Session trusted");
    }
  }

  private async callRemote<T>(action: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error: unknown) {
      throw fromRemoteFailure(error, action);
    }
  }

  private transition(next: AuthState, account: string): void {
    if (this.currentState === next) {
      return;
    }
    logger.debug({ account, from: this.currentState, to: next }, "Auth state transition");
    this.currentState = next;
    this.onStateChange?.(next, account);
  }
}
