import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
  /** When false, stdout is dropped and only the tail of stderr is kept, so output size is unbounded. */
  captureStdout?: boolean;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (binary: string, args: string[], options: CommandOptions) => Promise<CommandOutput>;

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    detail: { exitCode: number | null; timedOut: boolean; stdout: string; stderr: string; reason: string }
  ) {
    const suffix = detail.timedOut ? "timed out" : detail.stderr || detail.reason;
    super(`${command} failed: ${suffix}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = detail.exitCode;
    this.timedOut = detail.timedOut;
    this.stdout = detail.stdout;
    this.stderr = detail.stderr;
  }
}

interface ExecFailure {
  code?: unknown;
  killed?: unknown;
  signal?: unknown;
  stdout?: unknown;
  stderr?: unknown;
  message?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === "object" && error !== null;
}

function lastLines(raw: string, count = 3): string {
  return raw
    .trim()
    .split(/\r?\n/)
    .slice(-count)
    .join("\n");
}

const STDERR_TAIL_CHARS = 16 * 1024;

function runDiscardingStdout(command: string, binary: string, args: string[], options: CommandOptions): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, { cwd: options.cwd, stdio: ["ignore", "ignore", "pipe"] });
    let stderrTail = "";
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
    }, options.timeoutMs);

    const fail = (exitCode: number | null, reason: string) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      reject(new CommandError(command, { exitCode, timedOut, stdout: "", stderr: lastLines(stderrTail), reason }));
    };

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderrTail = `${stderrTail}${chunk}`.slice(-STDERR_TAIL_CHARS);
    });
    child.once("error", (error) => fail(null, error.message));
    child.once("close", (code, signal) => {
      if (code === 0 && !timedOut) {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve({ stdout: "", stderr: stderrTail });
        }
        return;
      }
      fail(code, signal ? `killed by ${signal}` : `exit ${code ?? "unknown"}`);
    });
  });
}

export const runCommand: CommandRunner = async (binary, args, options) => {
  const command = [binary, ...args].join(" ");
  if (options.captureStdout === false) {
    return runDiscardingStdout(command, binary, args, options);
  }

  try {
    const { stdout, stderr } = await execFileAsync(binary, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      maxBuffer: 1024 * 1024,
      encoding: "utf8"
    });
    return { stdout, stderr };
  } catch (error) {
    if (!isExecFailure(error)) {
      throw new CommandError(command, { exitCode: null, timedOut: false, stdout: "", stderr: "", reason: String(error) });
    }

    throw new CommandError(command, {
      exitCode: typeof error.code === "number" ? error.code : null,
      timedOut: error.killed === true && error.signal === "SIGTERM",
      stdout: typeof error.stdout === "string" ? error.stdout : "",
      stderr: typeof error.stderr === "string" ? lastLines(error.stderr) : "",
      reason: typeof error.message === "string" ? error.message : String(error)
    });
  }
};
