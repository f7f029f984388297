/**
 * Authentication types: credentials, session handles, state machine states
 * and the result-typed outcome of an authentication attempt.
 */

import type { IAliasOperations } from "./remote.js";

export interface ICredential {
  readonly account: string;
  readonly secret: string;
}

export interface ISessionArtifact {
  readonly account: string;
  readonly location: string;
}

/** Authenticated session, threaded explicitly into alias operations. */
export interface ISessionHandle {
  readonly account: string;
  readonly aliases: IAliasOperations;
}

/** Supplies a two-factor code, typically by prompting the user. */
export type TwoFactorProvider = () => Promise<string>;

export type AuthState =
  | "unauthenticated"
  | "resolving_credential"
  | "attempting_login"
  | "awaiting_two_factor"
  | "trusting"
  | "authenticated"
  | "failed";

export type AuthFailureKind =
  | "credentials_not_found"
  | "authentication_rejected"
  | "two_factor_required"
  | "store_error"
  | "biometric_denied"
  | "biometric_unavailable"
  | "biometric_timeout"
  | "network_error"
  | "unknown";

export type AuthOutcome =
  | { readonly status: "authenticated"; readonly session: ISessionHandle }
  | {
      readonly status: "failed";
      readonly kind: AuthFailureKind;
      readonly detail: string;
      readonly statusCode?: number | undefined;
    };

export interface IAuthenticateOptions {
  readonly secret?: string | undefined;
  readonly twoFactorProvider?: TwoFactorProvider | undefined;
}

export interface IAccountStatus {
  readonly account: string;
  readonly credentialsStored: boolean;
  readonly sessionValid: boolean;
  readonly biometricAvailable: boolean;
}
