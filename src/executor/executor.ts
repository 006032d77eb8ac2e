/**
 * Executor
 *
 * Runs approved shell commands through the platform shell and returns a
 * structured CommandResult. Callers are expected to have passed the command
 * through the allow-list gate and the classifier first.
 *
 * - sh -c CMD on Unix-like systems, cmd /C CMD on Windows
 * - timeout kills the child and is reported as a failure with its own summary
 * - timeouts and cancels kill the whole process group, pipelines included
 * - combined output over MAX_OUTPUT_BYTES of UTF-8 keeps a head of at most that many
 *   bytes, cut on a character boundary, and gets a byte-count marker
 * - stdout / stderr stay untruncated on the result
 */

import { spawn } from "node:child_process";
import { CoreError } from "../errors.js";
import { summarizeResult } from "./summary.js";

export const DEFAULT_COMMAND_TIMEOUT_SEC = 60;
export const MAX_OUTPUT_BYTES = 10_000;

export interface CommandResult {
  command: string;
  /** -1 for timeouts, spawn failures and cancellations */
  exitCode: number;
  stdout: string;
  stderr: string;
  combinedOutput: string;
  durationMs: number;
  success: boolean;
  summary: string;
  neededSudo: boolean;
}

export interface ExecuteOptions {
  timeoutSec?: number;
  cwd?: string;
  signal?: AbortSignal;
  platform?: NodeJS.Platform;
}

// ============== Process plumbing ==============

interface ProcessOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: Error;
}

/** How long a killed process group gets to release its pipes before the outcome is reported anyway */
const KILL_GRACE_MS = 500;

function runProcess(
  file: string,
  args: string[],
  options: { timeoutMs: number; cwd?: string; signal?: AbortSignal; stdin?: string },
): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let graceTimer: NodeJS.Timeout | undefined;

    // Own process group on POSIX so a timeout reaches pipelines and background jobs too
    const ownGroup = process.platform !== "win32";
    const child = spawn(file, args, {
      cwd: options.cwd,
      stdio: [options.stdin !== undefined ? "pipe" : "ignore", "pipe", "pipe"],
      windowsHide: true,
      detached: ownGroup,
    });

    const finish = (outcome: Omit<ProcessOutcome, "stdout" | "stderr" | "timedOut" | "aborted">) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve({
        ...outcome,
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: Buffer.concat(stderrChunks).toString("utf-8"),
        timedOut,
        aborted,
      });
    };

    const kill = () => {
      if (ownGroup && child.pid !== undefined) {
        try {
          process.kill(-child.pid, "SIGKILL");
        } catch {
          // Group already gone, or a member runs as root under sudo: signal the direct child instead
          if (child.exitCode === null) child.kill("SIGKILL");
        }
      } else if (child.exitCode === null && !child.killed) {
        child.kill("SIGKILL");
      }
      // Descendants that escaped the group can hold the pipes open; stop waiting for close
      graceTimer ??= setTimeout(() => {
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish({ exitCode: child.exitCode });
      }, KILL_GRACE_MS);
    };

    const onAbort = () => {
      aborted = true;
      kill();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, options.timeoutMs);

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    child.stdout?.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    if (options.stdin !== undefined && child.stdin) {
      // EPIPE when the child exits before reading is expected (e.g. cached sudo refusal)
      child.stdin.on("error", () => undefined);
      child.stdin.end(options.stdin);
    }

    child.on("error", (err) => finish({ exitCode: null, spawnError: err }));
    child.on("close", (code) => finish({ exitCode: code }));
  });
}

// ============== Result shaping ==============

const SUDO_FINGERPRINTS = ["Permission denied", "Operation not permitted", "password"];
const WRONG_PASSWORD_FINGERPRINTS = ["incorrect password", "Sorry, try again", "Authentication failure"];

/** Longest prefix that fits in `maxBytes` of UTF-8 without splitting a character */
function headWithinBytes(text: string, maxBytes: number): string {
  let end = 0;
  let bytes = 0;
  for (const ch of text) {
    const size = Buffer.byteLength(ch, "utf-8");
    if (bytes + size > maxBytes) break;
    bytes += size;
    end += ch.length;
  }
  return text.slice(0, end);
}

export function combineOutput(stdout: string, stderr: string): string {
  const combined = stderr.length > 0 ? `${stdout}\n${stderr}` : stdout;
  const total = Buffer.byteLength(combined, "utf-8");
  if (total <= MAX_OUTPUT_BYTES) return combined;
  return `${headWithinBytes(combined, MAX_OUTPUT_BYTES)}...\n[Output truncated, ${total} bytes total]`;
}

export function needsSudoFingerprint(stderr: string): boolean {
  return SUDO_FINGERPRINTS.some((fp) => stderr.includes(fp));
}

/** Drop the "[sudo] password for …" prompt sudo -S prints on stderr */
export function stripSudoPrompt(stderr: string): string {
  const newline = stderr.indexOf("\n");
  const first = newline === -1 ? stderr : stderr.slice(0, newline);
  if (first.includes("password for") || first.includes("[sudo]")) {
    return newline === -1 ? "" : stderr.slice(newline + 1);
  }
  return stderr;
}

export function isWrongPassword(stderr: string): boolean {
  return WRONG_PASSWORD_FINGERPRINTS.some((fp) => stderr.includes(fp));
}

function shapeResult(command: string, outcome: ProcessOutcome, startedAt: number, timeoutSec: number): CommandResult {
  const durationMs = Date.now() - startedAt;

  if (outcome.spawnError) {
    return {
      command,
      exitCode: -1,
      stdout: "",
      stderr: outcome.spawnError.message,
      combinedOutput: outcome.spawnError.message,
      durationMs,
      success: false,
      summary: `Command failed: ${outcome.spawnError.message}`,
      neededSudo: false,
    };
  }

  if (outcome.timedOut) {
    return {
      command,
      exitCode: -1,
      stdout: outcome.stdout,
      stderr: "Command timed out",
      combinedOutput: `Command timed out after ${timeoutSec}s`,
      durationMs,
      success: false,
      summary: `Timed out after ${timeoutSec}s`,
      neededSudo: false,
    };
  }

  if (outcome.aborted) {
    return {
      command,
      exitCode: -1,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      combinedOutput: combineOutput(outcome.stdout, outcome.stderr),
      durationMs,
      success: false,
      summary: "Cancelled",
      neededSudo: false,
    };
  }

  const exitCode = outcome.exitCode ?? -1;
  const success = exitCode === 0;
  const combinedOutput = combineOutput(outcome.stdout, outcome.stderr);
  return {
    command,
    exitCode,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    combinedOutput,
    durationMs,
    success,
    summary: summarizeResult({
      command,
      output: combinedOutput,
      stderr: outcome.stderr,
      success,
      durationMs,
    }),
    neededSudo: !success && needsSudoFingerprint(outcome.stderr),
  };
}

// ============== Public API ==============

export function shellInvocation(command: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  return platform === "win32" ? ["cmd", ["/C", command]] : ["sh", ["-c", command]];
}

export async function executeCommand(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
  const timeoutSec = options.timeoutSec ?? DEFAULT_COMMAND_TIMEOUT_SEC;
  const [file, args] = shellInvocation(command, options.platform);
  const startedAt = Date.now();
  const outcome = await runProcess(file, args, {
    timeoutMs: timeoutSec * 1000,
    cwd: options.cwd,
    signal: options.signal,
  });
  return shapeResult(command, outcome, startedAt, timeoutSec);
}

/**
 * Run CMD through `sudo -S -k sh -c CMD`, writing the password to stdin once.
 *
 * The password only lives in this call frame and the child's stdin buffer.
 */
export async function executeWithSudo(
  command: string,
  password: string,
  options: ExecuteOptions = {},
): Promise<CommandResult> {
  const platform = options.platform ?? process.platform;
  if (platform === "win32") {
    throw new CoreError("ExecutorFailed", "sudo is not available on Windows; use elevation instead");
  }

  const timeoutSec = options.timeoutSec ?? DEFAULT_COMMAND_TIMEOUT_SEC;
  const startedAt = Date.now();
  const outcome = await runProcess("sudo", ["-S", "-k", "sh", "-c", command], {
    timeoutMs: timeoutSec * 1000,
    cwd: options.cwd,
    signal: options.signal,
    stdin: `${password}\n`,
  });

  const stderr = stripSudoPrompt(outcome.stderr);
  if (!outcome.timedOut && !outcome.spawnError && isWrongPassword(stderr)) {
    return {
      command,
      exitCode: outcome.exitCode ?? -1,
      stdout: outcome.stdout,
      stderr,
      combinedOutput: combineOutput(outcome.stdout, stderr),
      durationMs: Date.now() - startedAt,
      success: false,
      summary: "Incorrect password",
      neededSudo: false,
    };
  }
  return shapeResult(command, { ...outcome, stderr }, startedAt, timeoutSec);
}

export function elevationScript(command: string): string {
  const escaped = command.replaceAll("'", "''");
  return `Start-Process cmd -ArgumentList '/c ${escaped}' -Verb RunAs -Wait -PassThru | Select-Object -ExpandProperty ExitCode`;
}

/**
 * Windows UAC elevation. The elevated child's stdout is not captured; success
 * is read from the exit code PowerShell prints.
 */
export async function executeWithElevation(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
  const timeoutSec = options.timeoutSec ?? DEFAULT_COMMAND_TIMEOUT_SEC;
  const startedAt = Date.now();
  const outcome = await runProcess("powershell", ["-NoProfile", "-Command", elevationScript(command)], {
    timeoutMs: timeoutSec * 1000,
    cwd: options.cwd,
    signal: options.signal,
  });

  if (outcome.spawnError || outcome.timedOut || outcome.aborted) {
    return shapeResult(command, outcome, startedAt, timeoutSec);
  }

  const printed = Number.parseInt(outcome.stdout.trim(), 10);
  const exitCode = Number.isNaN(printed) ? outcome.exitCode ?? -1 : printed;
  const success = exitCode === 0;
  const durationMs = Date.now() - startedAt;
  return {
    command,
    exitCode,
    stdout: "",
    stderr: outcome.stderr,
    combinedOutput: `Elevated command exited with code ${exitCode}`,
    durationMs,
    success,
    summary: success ? `Complete (${durationMs}ms)` : `Command failed (${durationMs}ms)`,
    neededSudo: false,
  };
}
