/**
 * Configuration types
 */

export type CredentialBackendKind = "auto" | "keychain" | "encrypted-file";

export interface IUserConfig {
  readonly defaultAccount?: string | undefined;
  readonly biometricTimeoutMs: number;
  readonly serviceUrl?: string | undefined;
  readonly credentialBackend: CredentialBackendKind;
}

export const DEFAULT_BIOMETRIC_TIMEOUT_MS = 60_000;

export const DEFAULT_CONFIG: IUserConfig = {
  biometricTimeoutMs: DEFAULT_BIOMETRIC_TIMEOUT_MS,
  credentialBackend: "auto",
};
