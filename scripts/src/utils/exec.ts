import { spawn } from "node:child_process";

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Resolve with the result instead of rejecting on a non-zero exit code. */
  allowFailure?: boolean;
}

export type CommandExecutor = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

export class CommandFailedError extends Error {
  readonly result: ExecResult;

  constructor(command: string, args: string[], result: ExecResult) {
    super(
      result.timedOut
        ? `Command timed out: ${command} ${args.join(" ")}`
        : `Command failed: ${command} ${args.join(" ")}`
    );
    this.name = "CommandFailedError";
    this.result = result;
  }
}

export async function exec(command: string, args: string[] = [], options: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, options.timeoutMs)
      : null;

    child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(Buffer.from(chunk)));
    child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(Buffer.from(chunk)));

    child.on("error", (error) => {
      if (timer) {
        clearTimeout(timer);
      }
      reject(error);
    });

    child.on("close", (exitCode) => {
      if (timer) {
        clearTimeout(timer);
      }
      const result: ExecResult = {
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
        exitCode: exitCode ?? (timedOut ? 124 : 1),
        timedOut
      };
      if ((result.exitCode === 0 && !timedOut) || options.allowFailure) {
        resolve(result);
      } else {
        reject(new CommandFailedError(command, args, result));
      }
    });
  });
}
