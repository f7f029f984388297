/**
 * Boundary to the remote account service.
 * The wire protocol belongs to the adapter; the session manager only sees
 * these interfaces, which is also where tests substitute a fake.
 */

import type { IEmailAlias } from "./alias.js";
import { AuthError } from "./errors.js";
import type { IErrorContext } from "./errors.js";

export interface ILoginResult {
  readonly requiresTwoFactor: boolean;
}

export interface IAliasOperations {
  list(): Promise<readonly IEmailAlias[]>;
}

export interface IRemoteAccountClient {
  login(account: string, secret: string): Promise<ILoginResult>;
  validateTwoFactorCode(code: string): Promise<boolean>;
  isTrustedSession(): Promise<boolean>;
  trustSession(): Promise<void>;
  /** Opaque session state (cookie jar) to persist after a confirmed login. */
  exportSession(): Promise<string>;
  readonly aliases: IAliasOperations;
}

export interface IRemoteAccountClientFactory {
  create(account: string, persistedSession?: string): IRemoteAccountClient;
}

/**
 * Raised by a remote client when the service refuses the credentials.
 * The session manager re-expresses it as AuthenticationRejectedError.
 */
export class LoginRejectedError extends AuthError {
  override readonly code = "MASKMAIL_REMOTE_REJECT_001" as const;
  readonly statusCode?: number | undefined;

  constructor(detail: string, statusCode?: number, context?: Partial<IErrorContext>) {
    super(detail, context);
    this.statusCode = statusCode;
  }
}
