/**
 * maskmail shared types — barrel export
 */

export type {
  ICredential,
  ISessionArtifact,
  ISessionHandle,
  TwoFactorProvider,
  AuthState,
  AuthFailureKind,
  AuthOutcome,
  IAuthenticateOptions,
  IAccountStatus,
} from "./auth.js";

export type {
  ILoginResult,
  IAliasOperations,
  IRemoteAccountClient,
  IRemoteAccountClientFactory,
} from "./remote.js";

export { LoginRejectedError } from "./remote.js";

export type { IEmailAlias } from "./alias.js";

export type { CredentialBackendKind, IUserConfig } from "./config.js";

export { DEFAULT_CONFIG, DEFAULT_BIOMETRIC_TIMEOUT_MS } from "./config.js";

export {
  MaskmailError,
  AuthError,
  CredentialsNotFoundError,
  AuthenticationRejectedError,
  TwoFactorRequiredError,
  NetworkError,
  CredentialStoreError,
  BiometricDeniedError,
  BiometricUnavailableError,
  BiometricTimeoutError,
  MissingConfigError,
  InvalidConfigError,
  InvalidAccountError,
  isBiometricError,
  errorMessage,
} from "./errors.js";

export type {
  IErrorContext,
  BiometricError,
  AnyAuthError,
  AnyMaskmailError,
} from "./errors.js";
