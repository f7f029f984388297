/**
 * Result-typed view of authentication failures.
 */

import type { AuthFailureKind, AuthOutcome } from "../types/index.js";
import {
  AuthenticationRejectedError,
  BiometricDeniedError,
  BiometricTimeoutError,
  BiometricUnavailableError,
  CredentialStoreError,
  CredentialsNotFoundError,
  NetworkError,
  TwoFactorRequiredError,
  errorMessage,
} from "../types/index.js";

export function failureKindOf(error: unknown): AuthFailureKind {
  if (error instanceof CredentialsNotFoundError) return "credentials_not_found";
  if (error instanceof AuthenticationRejectedError) return "authentication_rejected";
  if (error instanceof TwoFactorRequiredError) return "two_factor_required";
  if (error instanceof NetworkError) return "network_error";
  if (error instanceof CredentialStoreError) return "store_error";
  if (error instanceof BiometricDeniedError) return "biometric_denied";
  if (error instanceof BiometricUnavailableError) return "biometric_unavailable";
  if (error instanceof BiometricTimeoutError) return "biometric_timeout";
  return "unknown";
}

export function toAuthOutcome(error: unknown): Extract<AuthOutcome, { status: "failed" }> {
  const kind = failureKindOf(error);

  if (error instanceof AuthenticationRejectedError) {
    return {
      status: "failed",
      kind,
      detail: error.detail,
      ...(error.statusCode !== undefined ? { statusCode: error.statusCode } : {}),
    };
  }

  if (error instanceof CredentialStoreError) {
    return {
      status: "failed",
      kind,
      detail: error.message,
      ...(error.statusCode !== undefined ? { statusCode: error.statusCode } : {}),
    };
  }

  return { status: "failed", kind, detail: errorMessage(error) };
}
