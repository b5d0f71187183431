import { execFile } from "node:child_process";
import { ToolMissingError } from "../errors.js";

export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutS?: number;
}

/**
 * Runs an executable without a shell. Resolves with the exit status even when
 * it is non-zero; rejects with ToolMissingError when the binary is absent.
 */
export type CommandRunner = (file: string, args: readonly string[], options?: RunOptions) => Promise<RunResult>;

export const execRunner: CommandRunner = (file, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { cwd: options.cwd, timeout: (options.timeoutS ?? 30) * 1000, maxBuffer: 4 * 1024 * 1024, windowsHide: true },
      (err, stdout, stderr) => {
        if (!err) return resolve({ code: 0, stdout, stderr });
        if (err.code === "ENOENT") return reject(new ToolMissingError(file));
        if (err.killed) return resolve({ code: 124, stdout, stderr: stderr || `${file} timed out` });
        const code = typeof err.code === "number" ? err.code : 1;
        resolve({ code, stdout, stderr: stderr || err.message });
      },
    );
  });

/** Trimmed stdout and stderr joined, for labels and diagnostics. */
export function combinedOutput(result: RunResult): string {
  return [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join("\n");
}
