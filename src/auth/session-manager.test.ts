import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { AuthSessionManager } from "./session-manager.js";
import { CredentialStore } from "./credential-store.js";
import { BiometricGate } from "./biometric-gate.js";
import { SessionCache } from "./session-cache.js";
import type { AuthState } from "../types/index.js";
import {
  AuthError,
  AuthenticationRejectedError,
  BiometricDeniedError,
  CredentialsNotFoundError,
  NetworkError,
  TwoFactorRequiredError,
} from "../types/index.js";
import {
  FakeAccountService,
  FakeBiometricPlatform,
  InMemorySecretBackend,
  createTempDir,
} from "../test-support/fakes.js";
import type { IFakeAccountServiceOptions, ITempDir } from "../test-support/fakes.js";

const ACCOUNT = "alice@example.com";
const PASSWORD = "p@ss1";
const CODE = "123456";

let tmp: ITempDir;

interface IHarness {
  readonly backend: InMemorySecretBackend;
  readonly platform: FakeBiometricPlatform;
  readonly credentials: CredentialStore;
  readonly sessionCache: SessionCache;
  readonly remote: FakeAccountService;
  readonly manager: AuthSessionManager;
  readonly states: AuthState[];
}

function createHarness(options: Partial<IFakeAccountServiceOptions> = {}): IHarness {
  const backend = new InMemorySecretBackend();
  const platform = new FakeBiometricPlatform(true, "grant");
  const credentials = new CredentialStore(backend, new BiometricGate(platform, 200), "test.service");
  const sessionCache = new SessionCache(join(tmp.path, "session"));
  const remote = new FakeAccountService({ password: PASSWORD, twoFactorCode: CODE, ...options });
  const states: AuthState[] = [];
  const manager = new AuthSessionManager(remote, {
    credentials,
    sessionCache,
    onStateChange: (state) => states.push(state),
  });
  return { backend, platform, credentials, sessionCache, remote, manager, states };
}

const provideCode = (code: string) => async (): Promise<string> => code;

beforeEach(() => {
  tmp = createTempDir();
});

afterEach(() => {
  tmp.cleanup();
});

describe("AuthSessionManager", () => {
  describe("authenticate()", () => {
    it("completes first sign-in with two-factor and trusts the session", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);

      const session = await h.manager.authenticate(ACCOUNT, { twoFactorProvider: provideCode(CODE) });

      expect(session.account).toBe(ACCOUNT);
      expect(h.manager.state).toBe("authenticated");
      expect(h.states).toEqual([
        "resolving_credential",
        "attempting_login",
        "awaiting_two_factor",
        "trusting",
        "authenticated",
      ]);
      expect(h.remote.trustCalls).toBe(1);
      expect(h.platform.evaluateCalls).toBe(1);
      expect(h.platform.lastReason).toBe("Authenticate to access account credentials");
      expect(h.sessionCache.read(ACCOUNT)).toBe('{"trusted":true}');
    });

    it("reuses a trusted session artifact without a second challenge", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);
      await h.manager.authenticate(ACCOUNT, { twoFactorProvider: provideCode(CODE) });

      await h.manager.authenticate(ACCOUNT);

      expect(h.remote.createdWith).toEqual([undefined, '{"trusted":true}']);
      expect(h.remote.validateCalls).toBe(1);
      expect(h.manager.state).toBe("authenticated");
    });

    it("trims whitespace from the two-factor code", async () => {
      const h = createHarness();

      await h.manager.authenticate(ACCOUNT, { secret: PASSWORD, twoFactorProvider: provideCode(` ${CODE}\n`) });

      expect(h.manager.state).toBe("authenticated");
    });

    it("does not trust a session the service already trusts", async () => {
      const h = createHarness({ trustOnValidation: true });

      await h.manager.authenticate(ACCOUNT, { secret: PASSWORD, twoFactorProvider: provideCode(CODE) });

      expect(h.remote.trustCalls).toBe(0);
      expect(h.states).toContain("trusting");
    });

    it("skips the credential store when a secret is given", async () => {
      const h = createHarness({ twoFactorCode: undefined });

      await h.manager.authenticate(ACCOUNT, { secret: PASSWORD });

      expect(h.backend.findCalls).toBe(0);
      expect(h.platform.evaluateCalls).toBe(0);
      expect(h.states).toEqual(["attempting_login", "authenticated"]);
    });

    it("fails with TwoFactorRequiredError when no code provider is given", async () => {
      const h = createHarness();

      await expect(h.manager.authenticate(ACCOUNT, { secret: PASSWORD })).rejects.toBeInstanceOf(
        TwoFactorRequiredError,
      );
      expect(h.manager.state).toBe("failed");
      expect(h.sessionCache.exists(ACCOUNT)).toBe(false);
    });

    it("rejects an invalid two-factor code without trusting or persisting", async () => {
      const h = createHarness();

      const error = await h.manager
        .authenticate(ACCOUNT, { secret: PASSWORD, twoFactorProvider: provideCode("000000") })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthenticationRejectedError);
      expect(error instanceof AuthenticationRejectedError && error.detail).toBe("Invalid two-factor code");
      expect(h.remote.trustCalls).toBe(0);
      expect(h.sessionCache.exists(ACCOUNT)).toBe(false);
    });

    it("maps a rejected password to AuthenticationRejectedError with the status code", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, "wrong-password");

      const error = await h.manager.authenticate(ACCOUNT).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthenticationRejectedError);
      if (error instanceof AuthenticationRejectedError) {
        expect(error.detail).toBe("Invalid email or password");
        expect(error.statusCode).toBe(401);
      }
      expect(h.manager.state).toBe("failed");
      expect(h.sessionCache.exists(ACCOUNT)).toBe(false);
      expect(await h.credentials.has(ACCOUNT)).toBe(true);
    });

    it("fails with CredentialsNotFoundError before contacting the service", async () => {
      const h = createHarness();

      await expect(h.manager.authenticate(ACCOUNT)).rejects.toBeInstanceOf(CredentialsNotFoundError);
      expect(h.remote.loginCalls).toBe(0);
      expect(h.states).toEqual(["resolving_credential", "failed"]);
    });

    it("reports a denied biometric prompt as missing credentials and keeps the cause", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);
      h.platform.behavior = "deny";

      const error = await h.manager.authenticate(ACCOUNT).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CredentialsNotFoundError);
      expect(error instanceof Error && error.cause).toBeInstanceOf(BiometricDeniedError);
      expect(h.backend.findCalls).toBe(0);
      expect(h.remote.loginCalls).toBe(0);
    });

    it("reads credentials directly when Touch ID is unavailable", async () => {
      const h = createHarness({ twoFactorCode: undefined });
      await h.credentials.store(ACCOUNT, PASSWORD);
      h.platform.available = false;

      await h.manager.authenticate(ACCOUNT);

      expect(h.platform.evaluateCalls).toBe(0);
      expect(h.manager.state).toBe("authenticated");
    });

    it("wraps unexpected client failures in AuthError", async () => {
      const h = createHarness({ loginError: new Error("socket hang up") });

      const error = await h.manager.authenticate(ACCOUNT, { secret: PASSWORD }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof Error && error.message).toBe("Login failed: socket hang up");
    });

    it("passes typed client failures through unchanged", async () => {
      const networkError = new NetworkError("connection refused");
      const h = createHarness({ loginError: networkError });

      await expect(h.manager.authenticate(ACCOUNT, { secret: PASSWORD })).rejects.toBe(networkError);
    });
  });

  describe("authenticateOutcome()", () => {
    it("returns the session on success", async () => {
      const h = createHarness({ twoFactorCode: undefined });

      const outcome = await h.manager.authenticateOutcome(ACCOUNT, { secret: PASSWORD });

      expect(outcome.status).toBe("authenticated");
    });

    it("returns the failure kind, detail and status code on rejection", async () => {
      const h = createHarness();

      const outcome = await h.manager.authenticateOutcome(ACCOUNT, { secret: "wrong-password" });

      expect(outcome).toEqual({
        status: "failed",
        kind: "authentication_rejected",
        detail: "Invalid email or password",
        statusCode: 401,
      });
    });
  });

  describe("isSessionValid()", () => {
    it("is true after a successful sign-in and false once the session is cleared", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);
      await h.manager.authenticate(ACCOUNT, { twoFactorProvider: provideCode(CODE) });

      expect(await h.manager.isSessionValid(ACCOUNT)).toBe(true);

      h.manager.clearSession(ACCOUNT);

      expect(h.manager.state).toBe("unauthenticated");
      expect(await h.manager.isSessionValid(ACCOUNT)).toBe(false);
      expect(await h.credentials.has(ACCOUNT)).toBe(true);
    });

    it("is false without stored credentials", async () => {
      const h = createHarness();
      h.sessionCache.write(ACCOUNT, '{"trusted":true}');

      expect(await h.manager.isSessionValid(ACCOUNT)).toBe(false);
      expect(h.remote.loginCalls).toBe(0);
    });

    it("is false without a session artifact", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);

      expect(await h.manager.isSessionValid(ACCOUNT)).toBe(false);
      expect(h.remote.loginCalls).toBe(0);
    });

    it("is false when the stored session would need a new challenge", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);
      h.sessionCache.write(ACCOUNT, '{"trusted":false}');

      expect(await h.manager.isSessionValid(ACCOUNT)).toBe(false);
      expect(h.sessionCache.read(ACCOUNT)).toBe('{"trusted":false}');
    });

    it("is false when the service fails instead of throwing", async () => {
      const h = createHarness({ loginError: new NetworkError("connection refused") });
      await h.credentials.store(ACCOUNT, PASSWORD);
      h.sessionCache.write(ACCOUNT, '{"trusted":true}');

      expect(await h.manager.isSessionValid(ACCOUNT)).toBe(false);
    });

    it("does not change the manager state", async () => {
      const h = createHarness();
      await h.credentials.store(ACCOUNT, PASSWORD);
      h.sessionCache.write(ACCOUNT, '{"trusted":true}');

      await h.manager.isSessionValid(ACCOUNT);

      expect(h.states).toEqual([]);
    });
  });
});
