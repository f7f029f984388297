/**
 * maskmail — main barrel export
 * Public API surface for programmatic usage.
 */

// ── Types ───────────────────────────────────────────────────────────────

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
  ILoginResult,
  IAliasOperations,
  IRemoteAccountClient,
  IRemoteAccountClientFactory,
  IEmailAlias,
  CredentialBackendKind,
  IUserConfig,
  IErrorContext,
  BiometricError,
  AnyAuthError,
  AnyMaskmailError,
} from "./types/index.js";

export {
  DEFAULT_CONFIG,
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
  LoginRejectedError,
} from "./types/index.js";

// ── Auth ────────────────────────────────────────────────────────────────

export {
  CredentialStore,
  BiometricGate,
  DarwinBiometricPlatform,
  UnsupportedBiometricPlatform,
  SessionCache,
  AuthSessionManager,
  AccountService,
  createAccountService,
  createSecretBackend,
  SecurityCliBackend,
  EncryptedFileBackend,
  describeSecurityStatus,
  toAuthOutcome,
} from "./auth/index.js";

export type {
  IBiometricPlatform,
  IBiometricProbe,
  IBiometricReply,
  ISecretBackend,
  ISetupRequest,
  ILogoutResult,
} from "./auth/index.js";

// ── Remote ──────────────────────────────────────────────────────────────

export { HttpAccountClient, HttpAccountClientFactory } from "./remote/http-account-client.js";

// ── Storage ─────────────────────────────────────────────────────────────

export { ConfigStore } from "./storage/index.js";
