/**
 * Run an external conversion engine as a child process
 * Each call owns its process, so a crash or OOM stays with one item
 */

import { spawn } from "node:child_process";

export interface RunCommandOptions {
  signal?: AbortSignal;
  cwd?: string;
  // Merged over the parent's environment
  env?: NodeJS.ProcessEnv;
  // Config key to point at when the executable is missing
  configKey?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  executable: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (executable, args, options = {}) => {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(executable, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : undefined,
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        const hint = options.configKey
          ? ` Install it or set "${options.configKey}" to its location.`
          : "";
        reject(new Error(`Executable not found: "${executable}".${hint}`));
        return;
      }

      reject(error);
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }

      const status = signal ? `was killed by ${signal}` : `exited with code ${code}`;
      const tail = lastLines(stderr, 5);
      reject(new Error(tail ? `${executable} ${status}: ${tail}` : `${executable} ${status}`));
    });
  });
};

function lastLines(text: string, count: number): string {
  return text
    .trim()
    .split("\n")
    .slice(-count)
    .join("\n");
}
