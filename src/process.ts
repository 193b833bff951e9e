import { spawn } from "node:child_process";
import { open } from "node:fs/promises";
import { constants } from "node:os";
import { errorMessage, log } from "./logger.js";
import type { CommandSpec } from "./types.js";

export const TIMED_OUT = "timeout";

/** Exit code of the child, or `TIMED_OUT` when it was killed at the deadline. */
export type ExitStatus = number | typeof TIMED_OUT;

/** Exit code a shell reports for a command it cannot run. */
const SPAWN_FAILURE_EXIT = 127;
const MAX_CAPTURE_CHARS = 64_000;

function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  const value: unknown = entry?.[1];
  return 128 + (typeof value === "number" ? value : 0);
}

export interface DeadlineRunOptions {
  stdinPath: string;
  stdoutPath: string;
  timeoutMs: number;
  cwd?: string;
}

/**
 * Runs one command with stdin and stdout bound to files. The child is
 * SIGKILLed when the deadline passes, so nothing outlives a timeout.
 */
export async function runWithDeadline(spec: CommandSpec, opts: DeadlineRunOptions): Promise<ExitStatus> {
  const stdin = await open(opts.stdinPath, "r");
  try {
    const stdout = await open(opts.stdoutPath, "w");
    try {
      return await waitForExit(spec, opts, stdin.fd, stdout.fd);
    } finally {
      await stdout.close();
    }
  } finally {
    await stdin.close();
  }
}

function waitForExit(
  spec: CommandSpec,
  opts: DeadlineRunOptions,
  stdinFd: number,
  stdoutFd: number
): Promise<ExitStatus> {
  return new Promise<ExitStatus>((resolve) => {
    let settled = false;
    let timedOut = false;

    const settle = (status: ExitStatus) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(status);
    };

    const child = spawn(spec.command, spec.args, {
      cwd: opts.cwd,
      stdio: [stdinFd, stdoutFd, "inherit"]
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, opts.timeoutMs);

    child.once("error", (error) => {
      log("error", "Could not start solution", { command: spec.command, error: errorMessage(error) });
      settle(SPAWN_FAILURE_EXIT);
    });

    child.once("close", (code, signal) => {
      if (timedOut) {
        settle(TIMED_OUT);
      } else if (code !== null) {
        settle(code);
      } else {
        settle(signal ? signalExitCode(signal) : 1);
      }
    });
  });
}

export interface CompletionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs a command without a deadline (compilation) and captures its output. */
export async function runToCompletion(spec: CommandSpec, opts: { cwd?: string } = {}): Promise<CompletionResult> {
  return new Promise<CompletionResult>((resolve) => {
    let stdout = "";
    let stderr = "";

    const child = spawn(spec.command, spec.args, {
      cwd: opts.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      if (stdout.length < MAX_CAPTURE_CHARS) stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      if (stderr.length < MAX_CAPTURE_CHARS) stderr += chunk;
    });

    child.once("error", (error) => {
      resolve({ exitCode: SPAWN_FAILURE_EXIT, stdout, stderr: `${stderr}${errorMessage(error)}` });
    });

    child.once("close", (code, signal) => {
      resolve({ exitCode: code ?? (signal ? signalExitCode(signal) : 1), stdout, stderr });
    });
  });
}
