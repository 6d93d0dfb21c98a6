/**
 * Process execution boundary: spawn, wait, capture.
 */
import { spawn } from "child_process";

export interface ProcessRunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface ProcessRunResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
}

export type ProcessRunner = (
  args: readonly string[],
  opts: ProcessRunOptions
) => Promise<ProcessRunResult>;

/**
 * Spawns `args[0]` with the remaining arguments and waits for it to exit.
 *
 * Stdout is kept as raw bytes; stderr is decoded for diagnostics. Rejects only
 * when the executable cannot be started; a non-zero exit code resolves.
 */
export const runProcess: ProcessRunner = (args, opts) => {
  const [executable, ...rest] = args;
  if (executable === undefined) {
    return Promise.reject(new Error("Cannot run an empty argument list"));
  }

  return new Promise<ProcessRunResult>((resolve, reject) => {
    const child = spawn(executable, rest, {
      cwd: opts.cwd,
      env: opts.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout.push(data);
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("close", (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout),
        stderr,
      });
    });

    child.on("error", (err) => {
      reject(err);
    });
  });
};
