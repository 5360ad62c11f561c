/**
 * Child process execution for the external submission helper.
 *
 * Arguments are never logged: they carry judge passwords.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
  cwd?: string;
  signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;

export class ProcessError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'ProcessError';
  }
}

/**
 * Execute a command and capture output. The process is killed when the
 * timeout elapses or the signal aborts; both resolve with timedOut set.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const proc = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const kill = () => {
      timedOut = true;
      proc.kill('SIGKILL');
    };
    const timer = setTimeout(kill, options.timeoutMs);
    options.signal?.addEventListener('abort', kill, { once: true });

    // Decode across chunk boundaries so multi-byte characters survive
    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');

    proc.stdout?.on('data', (data: string) => {
      stdout += data;
    });

    proc.stderr?.on('data', (data: string) => {
      stderr += data;
    });

    proc.on('close', (code) => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', kill);
      resolve({
        exitCode: code ?? 1,
        stdout,
        stderr,
        durationMs: Date.now() - startedAt,
        timedOut,
      });
    });

    proc.on('error', (err) => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', kill);
      reject(new ProcessError(`Failed to execute ${command}: ${err.message}`, err));
    });
  });
};
