import { execFile, type ExecFileException, type ExecFileOptionsWithStringEncoding } from "node:child_process";

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
}

// Resolves once the process has exited or been killed on timeout.
// Rejects only when the process could not be started (ENOENT, EACCES, ...).
export interface ProcessRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<ProcessResult>;
}

export class LaunchError extends Error {
  constructor(public readonly command: string, public readonly errno: string | undefined, message: string) {
    super(message);
  }
}

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export function execFileOptions(timeoutMs: number): ExecFileOptionsWithStringEncoding {
  return {
    timeout: timeoutMs,
    killSignal: "SIGKILL",
    maxBuffer: MAX_OUTPUT_BYTES,
    encoding: "utf8",
    windowsHide: true,
  };
}

export function toProcessResult(
  command: string,
  error: ExecFileException | null,
  stdout: string,
  stderr: string,
): ProcessResult {
  if (!error) return { exitCode: 0, stdout, stderr, timedOut: false };

  // Killed for flooding stdout/stderr; it did start, so report it as a failed run.
  if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
    return { exitCode: null, stdout, stderr: stderr || error.message, timedOut: false };
  }
  // Spawn failures carry a string errno code; exits carry a numeric status.
  if (typeof error.code === "string") {
    throw new LaunchError(command, error.code, error.message);
  }
  if (error.killed && error.signal === "SIGKILL") {
    return { exitCode: null, stdout, stderr, timedOut: true };
  }
  return { exitCode: typeof error.code === "number" ? error.code : null, stdout, stderr, timedOut: false };
}

export const execFileRunner: ProcessRunner = {
  run(command, args, { timeoutMs }) {
    return new Promise<ProcessResult>((resolve, reject) => {
      execFile(
        command,
        [...args],
        execFileOptions(timeoutMs),
        (error, stdout, stderr) => {
          try {
            resolve(toProcessResult(command, error, stdout, stderr));
          } catch (err) {
            reject(err);
          }
        },
      );
    });
  },
};
