/**
 * External CLI Invocation
 *
 * Adapters that drive a vendor CLI go through a `CommandRunner` so tests
 * can substitute a scripted one.
 */

import { execFile } from "node:child_process";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Added on top of the current environment */
  env?: Readonly<Record<string, string>>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Run a command to completion. Never rejects: spawn failures, timeouts
 * and non-zero exits all come back as a result with a non-zero code.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Default runner on top of `execFile`
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve) => {
    execFile(
      command,
      [...args],
      {
        env: options.env ? { ...process.env, ...options.env } : process.env,
        timeout: options.timeoutMs,
        signal: options.signal,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf-8",
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const exitCode = typeof error.code === "number" ? error.code : 1;
        let detail = stderr;
        if (error.killed && options.timeoutMs !== undefined && !options.signal?.aborted) {
          detail = `${command} timed out after ${options.timeoutMs}ms\n${stderr}`;
        } else if (typeof error.code !== "number") {
          detail = `${error.message}\n${stderr}`;
        }
        resolve({ exitCode, stdout, stderr: detail.trim() });
      }
    );
  });

/**
 * Write `content` to a private temporary file, run `fn` with its path,
 * then remove it
 */
export const withTempFile = async <T>(
  prefix: string,
  fileName: string,
  content: string,
  fn: (path: string) => Promise<T>
): Promise<T> => {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  const path = join(dir, fileName);
  try {
    // May hold secrets rendered into the script
    await writeFile(path, content, { mode: 0o600 });
    return await fn(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};
