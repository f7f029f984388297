import { describe, it, expect, vi } from "vitest";
import {
  BiometricGate,
  DarwinBiometricPlatform,
  UnsupportedBiometricPlatform,
  createBiometricPlatform,
} from "./biometric-gate.js";
import type { IBiometricPlatform, IBiometricReply } from "./biometric-gate.js";
import {
  BiometricDeniedError,
  BiometricTimeoutError,
  BiometricUnavailableError,
} from "../types/index.js";
import type { CommandRunner, ICommandResult } from "../utils/process.js";
import { FakeBiometricPlatform } from "../test-support/fakes.js";

function result(exitCode: number, stdout: string, stderr = ""): ICommandResult {
  return { exitCode, stdout, stderr };
}

function runnerReturning(value: ICommandResult): CommandRunner {
  return vi.fn<CommandRunner>(async () => value);
}

function replyOf(platform: IBiometricPlatform, signal = new AbortController().signal): Promise<IBiometricReply> {
  return new Promise((resolve) => platform.evaluate("Unlock for test", resolve, signal));
}

describe("BiometricGate", () => {
  it("reports availability from the platform probe", async () => {
    const platform = new FakeBiometricPlatform(false);
    const gate = new BiometricGate(platform);

    expect(await gate.isAvailable()).toBe(false);
    platform.available = true;
    expect(await gate.isAvailable()).toBe(true);
    expect(platform.probeCalls).toBe(2);
  });

  it("reads a throwing probe as unavailable", async () => {
    const platform: IBiometricPlatform = {
      canEvaluate: async () => {
        throw new Error("helper crashed");
      },
      evaluate: () => undefined,
    };

    expect(await new BiometricGate(platform).isAvailable()).toBe(false);
  });

  it("resolves when the user authenticates", async () => {
    const platform = new FakeBiometricPlatform(true, "grant");

    await expect(new BiometricGate(platform).verify("Unlock for test")).resolves.toBeUndefined();
    expect(platform.lastReason).toBe("Unlock for test");
  });

  it("throws BiometricDeniedError with the platform reason", async () => {
    const gate = new BiometricGate(new FakeBiometricPlatform(true, "deny"));

    const error = await gate.verify("Unlock for test").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BiometricDeniedError);
    expect(error instanceof Error && error.message).toBe("Biometric verification failed: User canceled");
  });

  it("throws BiometricUnavailableError without presenting a prompt", async () => {
    const platform = new FakeBiometricPlatform(false);

    await expect(new BiometricGate(platform).verify("Unlock for test")).rejects.toBeInstanceOf(
      BiometricUnavailableError,
    );
    expect(platform.evaluateCalls).toBe(0);
  });

  it("times out and aborts a prompt that never replies", async () => {
    const platform = new FakeBiometricPlatform(true, "hang");
    const gate = new BiometricGate(platform);

    const error = await gate.verify("Unlock for test", { timeoutMs: 20 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BiometricTimeoutError);
    expect(error instanceof BiometricTimeoutError && error.timeoutMs).toBe(20);
    expect(platform.lastSignal?.aborted).toBe(true);
  });

  it("uses the constructor deadline when none is given", async () => {
    const gate = new BiometricGate(new FakeBiometricPlatform(true, "hang"), 15);

    const error = await gate.verify("Unlock for test").catch((caught: unknown) => caught);

    expect(error instanceof BiometricTimeoutError && error.timeoutMs).toBe(15);
  });

  it("settles once when the platform replies twice", async () => {
    const platform: IBiometricPlatform = {
      canEvaluate: async () => ({ available: true }),
      evaluate: (_reason, reply) => {
        reply({ success: true });
        reply({ success: false, error: "late failure" });
      },
    };

    await expect(new BiometricGate(platform).verify("Unlock for test")).resolves.toBeUndefined();
  });

  it("treats a throwing evaluate as a denial", async () => {
    const platform: IBiometricPlatform = {
      canEvaluate: async () => ({ available: true }),
      evaluate: () => {
        throw new Error("context invalidated");
      },
    };

    await expect(new BiometricGate(platform).verify("Unlock for test")).rejects.toBeInstanceOf(
      BiometricDeniedError,
    );
  });
});

describe("DarwinBiometricPlatform", () => {
  it("runs the helper script in probe mode", async () => {
    const run = runnerReturning(result(0, '{"available":true}'));
    const platform = new DarwinBiometricPlatform(run, "/tmp/touchid.swift");

    expect(await platform.canEvaluate()).toEqual({ available: true });
    expect(run).toHaveBeenCalledWith("/usr/bin/swift", ["/tmp/touchid.swift", "probe"], { timeoutMs: 20_000 });
  });

  it("reports the helper's stderr when the probe fails", async () => {
    const platform = new DarwinBiometricPlatform(runnerReturning(result(1, "", "swift: not found\n")), "/tmp/t.swift");

    expect(await platform.canEvaluate()).toEqual({ available: false, error: "swift: not found" });
  });

  it("reports unparseable probe output as unavailable", async () => {
    const platform = new DarwinBiometricPlatform(runnerReturning(result(0, "not json")), "/tmp/t.swift");

    expect(await platform.canEvaluate()).toEqual({
      available: false,
      error: "Touch ID helper returned no result",
    });
  });

  it("passes the reason and signal to the helper", async () => {
    const run = runnerReturning(result(0, '{"success":false,"error":"User canceled"}'));
    const platform = new DarwinBiometricPlatform(run, "/tmp/t.swift");
    const controller = new AbortController();

    expect(await replyOf(platform, controller.signal)).toEqual({ success: false, error: "User canceled" });
    expect(run).toHaveBeenCalledWith("/usr/bin/swift", ["/tmp/t.swift", "evaluate", "Unlock for test"], {
      timeoutMs: 0,
      signal: controller.signal,
    });
  });

  it("replies with a failure when the helper cannot be spawned", async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error("spawn EACCES");
    });

    expect(await replyOf(new DarwinBiometricPlatform(run, "/tmp/t.swift"))).toEqual({
      success: false,
      error: "spawn EACCES",
    });
  });
});

describe("createBiometricPlatform", () => {
  it("selects the unsupported platform off macOS", async () => {
    const platform = createBiometricPlatform("linux");

    expect(platform).toBeInstanceOf(UnsupportedBiometricPlatform);
    expect(await platform.canEvaluate()).toMatchObject({ available: false });
    expect(await replyOf(platform)).toEqual({
      success: false,
      error: "Touch ID is not supported on this platform",
    });
  });

  it("selects the helper platform on macOS", () => {
    expect(createBiometricPlatform("darwin")).toBeInstanceOf(DarwinBiometricPlatform);
  });
});
