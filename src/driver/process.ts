/**
 * External process runner
 *
 * Every call gets an explicit absolute cwd; the parent's working directory
 * is never changed. Output is either inherited or redirected to a file.
 */

import { spawn, type StdioOptions } from 'node:child_process';
import { open, type FileHandle } from 'node:fs/promises';

const KILL_GRACE_MS = 5000;

export interface CommandOptions {
  /** Absolute working directory for the child */
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /**
   * Redirect output into this file (truncated first). stdout and stderr share
   * the file unless `separateStderr` is set.
   */
  outputFile?: string;
  /** Write stderr to `{outputFile}.stderr.log` instead */
  separateStderr?: boolean;
  /** Kill the child after this many milliseconds; 0 or unset disables */
  timeoutMs?: number;
}

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Signature shared by the real runner and test fakes
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

export function stderrFileFor(outputFile: string): string {
  return `${outputFile}.stderr.log`;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

function spawnAndWait(
  command: string,
  args: readonly string[],
  opts: { cwd: string; env?: NodeJS.ProcessEnv; stdio: StdioOptions; timeoutMs: number }
): Promise<CommandResult> {
  const start = Date.now();

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      stdio: opts.stdio,
    });

    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;
    const timer =
      opts.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGTERM');
            killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
          }, opts.timeoutMs)
        : undefined;

    const clearTimers = (): void => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on('close', (code, signal) => {
      clearTimers();
      resolve({ code, signal, timedOut, durationMs: Date.now() - start });
    });

    child.on('error', (err) => {
      clearTimers();
      reject(new Error(`Failed to start "${formatCommand(command, args)}": ${err.message}`, { cause: err }));
    });
  });
}

/**
 * Run a command to completion. Resolves with the exit status; rejects only
 * when the process cannot be started.
 */
export const runCommand: CommandRunner = async (command, args, options) => {
  const handles: FileHandle[] = [];

  try {
    let stdio: StdioOptions = 'inherit';

    if (options.outputFile) {
      const out = await open(options.outputFile, 'w');
      handles.push(out);
      let errFd = out.fd;
      if (options.separateStderr) {
        const err = await open(stderrFileFor(options.outputFile), 'w');
        handles.push(err);
        errFd = err.fd;
      }
      stdio = ['ignore', out.fd, errFd];
    }

    return await spawnAndWait(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio,
      timeoutMs: options.timeoutMs ?? 0,
    });
  } finally {
    await Promise.all(handles.map((handle) => handle.close()));
  }
};
