/**
 * Auth module barrel export
 */

export { CredentialStore, SERVICE_NAME, DEFAULT_UNLOCK_PROMPT } from "./credential-store.js";
export {
  BiometricGate,
  DarwinBiometricPlatform,
  UnsupportedBiometricPlatform,
  createBiometricPlatform,
} from "./biometric-gate.js";
export type {
  IBiometricPlatform,
  IBiometricProbe,
  IBiometricReply,
  BiometricReplyCallback,
  IVerifyOptions,
} from "./biometric-gate.js";
export { SessionCache, validateAccountName } from "./session-cache.js";
export { AuthSessionManager } from "./session-manager.js";
export type { IAuthSessionManagerOptions, StateChangeListener } from "./session-manager.js";
export { toAuthOutcome, failureKindOf } from "./auth-outcome.js";
export { createSecretBackend } from "./secret-backend.js";
export type { ISecretBackend } from "./secret-backend.js";
export { SecurityCliBackend, parseSecurityStatus } from "./keychain-backend.js";
export { EncryptedFileBackend } from "./encrypted-file-backend.js";
export type { IEncryptedFileBackendOptions } from "./encrypted-file-backend.js";
export { describeSecurityStatus, SECURITY_STATUS_MESSAGES, SEC_ITEM_NOT_FOUND } from "./security-status.js";
export { AccountService, createAccountService } from "./account-service.js";
export type {
  ISetupRequest,
  ILogoutResult,
  IAccountServiceDeps,
  ICreateAccountServiceOptions,
} from "./account-service.js";
