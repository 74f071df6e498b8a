/**
 * Command runner for external build tools.
 *
 * Spawns a process, captures the tail of its output and resolves with the
 * exit code. An aborted signal kills the process. Adapters receive a CommandRunner so
 * tests can substitute a scripted one.
 */

import { spawn } from 'child_process';

export interface CommandOptions {
  cwd: string;
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
  /** Characters kept from the end of each output stream. */
  maxOutputChars?: number;
}

export const DEFAULT_MAX_OUTPUT_CHARS = 64 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

/** The executable could not be started (missing from PATH). */
export class CommandNotFoundError extends Error {
  constructor(public readonly command: string) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
  }
}

/** The command was killed because its signal was aborted. */
export class CommandAbortedError extends Error {
  constructor(public readonly command: string) {
    super(`Command aborted: ${command}`);
    this.name = 'CommandAbortedError';
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Append a chunk to captured output, keeping at most `limit` trailing characters. */
export function appendTail(captured: string, chunk: string, limit: number): string {
  const combined = captured + chunk;
  return combined.length > limit ? combined.slice(combined.length - limit) : combined;
}

/** Run a command with child_process.spawn. */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new CommandAbortedError(command));
      return;
    }

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      signal: options.signal,
      windowsHide: true,
    });

    const limit = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout = appendTail(stdout, data.toString(), limit);
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr = appendTail(stderr, data.toString(), limit);
    });

    proc.on('close', (exitCode) => {
      resolve({ exitCode: exitCode ?? 1, stdout, stderr });
    });

    proc.on('error', (error) => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        reject(new CommandNotFoundError(command));
      } else if (error.name === 'AbortError') {
        reject(new CommandAbortedError(command));
      } else {
        reject(error);
      }
    });
  });

/** Last lines of a command's output, for error messages. */
export function outputTail(result: CommandResult, lines: number = 5): string {
  const text = (result.stderr.trim() || result.stdout.trim()).split('\n');
  return text.slice(-lines).join('\n');
}
