import { spawn } from "node:child_process";

export type ExecResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

/**
 * Spawns `command` without a shell and buffers its output. Resolves with the
 * exit code (-1 when killed by a signal); rejects only when the process
 * cannot be started or `signal` aborts it.
 */
export function execCommand(
  command: string,
  args: readonly string[],
  options: { cwd?: string; signal?: AbortSignal } = {}
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      windowsHide: true,
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const out: Buffer[] = [];
    const err: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => err.push(chunk));

    child.once("error", reject);
    child.once("close", (code) => {
      resolve({
        stdout: Buffer.concat(out).toString("utf8"),
        stderr: Buffer.concat(err).toString("utf8"),
        exitCode: code ?? -1,
      });
    });
  });
}
