/**
 * Subprocess execution via execa.
 * Non-zero exits are returned as results; spawn failures, timeouts and
 * cancellations are thrown for the caller to classify.
 */

import { execa, ExecaError } from "execa";

const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface ICommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ICommandOptions {
  readonly timeoutMs?: number | undefined;
  readonly signal?: AbortSignal | undefined;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: ICommandOptions,
) => Promise<ICommandResult>;

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  try {
    const result = await execa(file, [...args], {
      timeout: options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      stdin: "ignore",
      stripFinalNewline: true,
      ...(options.signal !== undefined ? { cancelSignal: options.signal } : {}),
    });
    return {
      exitCode: result.exitCode ?? 0,
      stdout: asText(result.stdout),
      stderr: asText(result.stderr),
    };
  } catch (error: unknown) {
    if (error instanceof ExecaError && typeof error.exitCode === "number" && !error.isCanceled) {
      return {
        exitCode: error.exitCode,
        stdout: asText(error.stdout),
        stderr: asText(error.stderr),
      };
    }
    throw error;
  }
};

export function isMissingCommandError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export function isCanceledError(error: unknown): boolean {
  return error instanceof ExecaError && error.isCanceled;
}
