/**
 * maskmail typed error hierarchy.
 * Every error carries a stable code, a user message, and optionally a
 * diagnostic message and a recovery hint the CLI prints verbatim.
 */

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
  readonly cause?: unknown;
}

export abstract class MaskmailError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message, context?.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Authentication Errors ────────────────────────────────────────────────

/**
 * Base of every authentication failure. Thrown as-is for failures that do not
 * fit a more specific kind, with the original error kept as `cause`.
 */
export class AuthError extends MaskmailError {
  readonly code: string = "MASKMAIL_AUTH_001";
  readonly userMessage: string;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message, context);
    this.userMessage = `Authentication failed: ${message}`;
  }
}

export class CredentialsNotFoundError extends AuthError {
  override readonly code = "MASKMAIL_AUTH_NOCRED_001" as const;
  override readonly userMessage: string;
  readonly account: string;

  constructor(account: string, context?: Partial<IErrorContext>) {
    super(`No stored credentials found for ${account}`, context);
    this.account = account;
    this.userMessage = `No stored credentials found for ${account}.`;
    this.suggestedRecovery = context?.suggestedRecovery ?? "Run 'maskmail setup' to store your credentials.";
  }
}

export class AuthenticationRejectedError extends AuthError {
  override readonly code = "MASKMAIL_AUTH_REJECT_001" as const;
  override readonly userMessage: string;
  readonly detail: string;
  readonly statusCode?: number | undefined;

  constructor(detail: string, statusCode?: number, context?: Partial<IErrorContext>) {
    super(`Login failed: ${detail}`, context);
    this.detail = detail;
    this.statusCode = statusCode;
    this.userMessage = `The account service rejected the sign-in: ${detail}`;
    this.suggestedRecovery = "Check your password or two-factor code and try again.";
  }
}

export class TwoFactorRequiredError extends AuthError {
  override readonly code = "MASKMAIL_AUTH_2FA_001" as const;
  override readonly userMessage: string;

  constructor(account: string) {
    super(`Two-factor verification required for ${account} but no code provider was given`);
    this.userMessage = `Two-factor verification is required for ${account}.`;
    this.suggestedRecovery = "Run the command interactively to enter the two-factor code.";
  }
}

export class NetworkError extends AuthError {
  override readonly code = "MASKMAIL_NET_001" as const;
  override readonly userMessage: string;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message, context);
    this.userMessage = `Could not reach the account service: ${message}`;
    this.suggestedRecovery = "Check your network connection and retry.";
  }
}

// ── Credential Store Errors ──────────────────────────────────────────────

export class CredentialStoreError extends MaskmailError {
  readonly code = "MASKMAIL_STORE_001" as const;
  readonly userMessage: string;
  readonly statusCode?: number | undefined;

  constructor(message: string, statusCode?: number, context?: Partial<IErrorContext>) {
    super(message, context);
    this.statusCode = statusCode;
    this.userMessage = `Secure storage operation failed: ${message}`;
    this.suggestedRecovery = context?.suggestedRecovery ?? "Check that the keychain is unlocked and accessible.";
  }
}

// ── Biometric Errors ─────────────────────────────────────────────────────

export class BiometricDeniedError extends MaskmailError {
  readonly code = "MASKMAIL_BIO_DENIED_001" as const;
  readonly userMessage: string;

  constructor(reason?: string) {
    super(`Biometric verification failed${reason ? `: ${reason}` : ""}`);
    this.userMessage = `Touch ID verification failed${reason ? `: ${reason}` : ""}.`;
    this.suggestedRecovery = "Retry and complete the Touch ID prompt.";
  }
}

export class BiometricUnavailableError extends MaskmailError {
  readonly code = "MASKMAIL_BIO_UNAVAIL_001" as const;
  readonly userMessage: string;

  constructor(reason?: string) {
    super(`Biometric verification unavailable${reason ? `: ${reason}` : ""}`);
    this.userMessage = "Touch ID is not available on this device.";
    this.suggestedRecovery = "Check that a device passcode is set and Touch ID is enrolled.";
  }
}

export class BiometricTimeoutError extends MaskmailError {
  readonly code = "MASKMAIL_BIO_TIMEOUT_001" as const;
  readonly userMessage: string;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Biometric verification timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
    this.userMessage = `Touch ID prompt timed out after ${Math.ceil(timeoutMs / 1000)}s.`;
    this.suggestedRecovery = "Retry and complete the Touch ID prompt.";
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class MissingConfigError extends MaskmailError {
  readonly code = "MASKMAIL_CONFIG_MISS_001" as const;
  readonly userMessage: string;

  constructor(key: string, hint?: string) {
    super(`Missing configuration: ${key}`);
    this.userMessage = `Missing configuration "${key}".`;
    this.suggestedRecovery = hint;
  }
}

export class InvalidConfigError extends MaskmailError {
  readonly code = "MASKMAIL_CONFIG_INVALID_001" as const;
  readonly userMessage: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`);
    this.userMessage = `Invalid configuration "${key}": ${reason}`;
  }
}

export class InvalidAccountError extends MaskmailError {
  readonly code = "MASKMAIL_CONFIG_ACCOUNT_001" as const;
  readonly userMessage: string;

  constructor(account: string, reason: string) {
    super(`Invalid account identifier "${account}": ${reason}`);
    this.userMessage = `Invalid account "${account}": ${reason}`;
  }
}

// ── Discriminated Error Union ────────────────────────────────────────────

export type BiometricError =
  | BiometricDeniedError
  | BiometricUnavailableError
  | BiometricTimeoutError;

export type AnyAuthError =
  | AuthError
  | CredentialsNotFoundError
  | AuthenticationRejectedError
  | TwoFactorRequiredError
  | NetworkError;

export type AnyMaskmailError =
  | AnyAuthError
  | CredentialStoreError
  | BiometricError
  | MissingConfigError
  | InvalidConfigError
  | InvalidAccountError;

export function isBiometricError(error: unknown): error is BiometricError {
  return (
    error instanceof BiometricDeniedError ||
    error instanceof BiometricUnavailableError ||
    error instanceof BiometricTimeoutError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
