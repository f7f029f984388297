/**
 * Biometric gate: Touch ID capability probe and verification.
 *
 * The platform reports completion through a callback; verify() joins that
 * callback onto a one-shot promise that settles exactly once, either with the
 * platform's reply or with a timeout that aborts the pending prompt.
 */

import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  BiometricDeniedError,
  BiometricTimeoutError,
  BiometricUnavailableError,
  DEFAULT_BIOMETRIC_TIMEOUT_MS,
  errorMessage,
} from "../types/index.js";
import { runCommand, isCanceledError } from "../utils/process.js";
import type { CommandRunner } from "../utils/process.js";
import { logger } from "../utils/index.js";

export interface IBiometricProbe {
  readonly available: boolean;
  readonly error?: string | undefined;
}

export interface IBiometricReply {
  readonly success: boolean;
  readonly error?: string | undefined;
}

export type BiometricReplyCallback = (reply: IBiometricReply) => void;

export interface IBiometricPlatform {
  canEvaluate(): Promise<IBiometricProbe>;
  /** Presents the prompt; `reply` is invoked once the user responds. */
  evaluate(reason: string, reply: BiometricReplyCallback, signal: AbortSignal): void;
}

export interface IVerifyOptions {
  readonly timeoutMs?: number | undefined;
}

// ── Platforms ────────────────────────────────────────────────────────────

const SWIFT_BIN = "/usr/bin/swift";
const HELPER_SCRIPT = fileURLToPath(new URL("../../resources/touchid.swift", import.meta.url));
const PROBE_TIMEOUT_MS = 20_000;

const ProbeSchema = z.object({
  available: z.boolean(),
  error: z.string().optional(),
});

const ReplySchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
});

function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * LocalAuthentication through a small Swift helper, so that no native
 * addon is needed.
 */
export class DarwinBiometricPlatform implements IBiometricPlatform {
  private readonly run: CommandRunner;
  private readonly scriptPath: string;

  constructor(runner?: CommandRunner, scriptPath?: string) {
    this.run = runner ?? runCommand;
    this.scriptPath = scriptPath ?? HELPER_SCRIPT;
  }

  async canEvaluate(): Promise<IBiometricProbe> {
    const result = await this.run(SWIFT_BIN, [this.scriptPath, "probe"], { timeoutMs: PROBE_TIMEOUT_MS });
    const parsed = ProbeSchema.safeParse(parseJson(result.stdout));
    if (result.exitCode !== 0 || !parsed.success) {
      return { available: false, error: result.stderr.trim() || "Touch ID helper returned no result" };
    }
    return parsed.data;
  }

  evaluate(reason: string, reply: BiometricReplyCallback, signal: AbortSignal): void {
    void this.run(SWIFT_BIN, [this.scriptPath, "evaluate", reason], { timeoutMs: 0, signal })
      .then((result) => {
        const parsed = ReplySchema.safeParse(parseJson(result.stdout));
        if (result.exitCode !== 0 || !parsed.success) {
          reply({ success: false, error: result.stderr.trim() || "Touch ID helper returned no result" });
          return;
        }
        reply(parsed.data);
      })
      .catch((error: unknown) => {
        reply({
          success: false,
          error: isCanceledError(error) ? "Authentication canceled" : errorMessage(error),
        });
      });
  }
}

export class UnsupportedBiometricPlatform implements IBiometricPlatform {
  async canEvaluate(): Promise<IBiometricProbe> {
    return { available: false, error: `Touch ID is not supported on ${process.platform}` };
  }

  evaluate(_reason: string, reply: BiometricReplyCallback): void {
    reply({ success: false, error: "Touch ID is not supported on this platform" });
  }
}

export function createBiometricPlatform(platform: NodeJS.Platform = process.platform): IBiometricPlatform {
  return platform === "darwin" ? new DarwinBiometricPlatform() : new UnsupportedBiometricPlatform();
}

// ── Gate ─────────────────────────────────────────────────────────────────

export class BiometricGate {
  private readonly platform: IBiometricPlatform;
  private readonly defaultTimeoutMs: number;

  constructor(platform?: IBiometricPlatform, defaultTimeoutMs?: number) {
    this.platform = platform ?? createBiometricPlatform();
    this.defaultTimeoutMs = defaultTimeoutMs ?? DEFAULT_BIOMETRIC_TIMEOUT_MS;
  }

  /** Re-probed on every call: passcode or enrollment can change between runs. */
  async isAvailable(): Promise<boolean> {
    return (await this.probe()).available;
  }

  async verify(reason: string, options: IVerifyOptions = {}): Promise<void> {
    const probe = await this.probe();
    if (!probe.available) {
      throw new BiometricUnavailableError(probe.error);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const reply = await this.awaitReply(reason, timeoutMs);
    if (!reply.success) {
      logger.info({ error: reply.error }, "Biometric verification denied");
      throw new BiometricDeniedError(reply.error);
    }
    logger.debug("Biometric verification succeeded");
  }

  private async probe(): Promise<IBiometricProbe> {
    try {
      return await this.platform.canEvaluate();
    } catch (error: unknown) {
      const message = errorMessage(error);
      logger.debug({ error: message }, "Biometric probe failed");
      return { available: false, error: message };
    }
  }

  private awaitReply(reason: string, timeoutMs: number): Promise<IBiometricReply> {
    const controller = new AbortController();

    return new Promise<IBiometricReply>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;
        controller.abort();
        logger.warn({ timeoutMs }, "Biometric verification timed out");
        reject(new BiometricTimeoutError(timeoutMs));
      }, timeoutMs);

      const settle = (reply: IBiometricReply): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(reply);
      };

      try {
        this.platform.evaluate(reason, settle, controller.signal);
      } catch (error: unknown) {
        settle({ success: false, error: errorMessage(error) });
      }
    });
  }
}
