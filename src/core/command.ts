/**
 * Subprocess execution for CLI-backed secret stores (op, bw, pass, doppler).
 *
 * Commands run without a shell. Extra environment (session tokens) is layered
 * over the parent environment and scrubbed from captured output.
 */

import { spawn } from 'child_process';

export interface CommandOptions {
  /** Extra environment variables, e.g. BW_SESSION */
  env?: Record<string, string>;
  stdin?: string;
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs one command to completion. Injected so tests never spawn processes.
 */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

/** Exit code reported when the executable could not be started */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

/**
 * Replace every occurrence of the given secrets in `output`.
 * Values shorter than 8 characters are left alone; they match too much.
 */
export function scrubSecrets(output: string, secrets: Iterable<string>): string {
  let scrubbed = output;
  for (const secret of secrets) {
    if (secret && secret.length >= 8) {
      scrubbed = scrubbed.replaceAll(secret, '[REDACTED]');
    }
  }
  return scrubbed;
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'pipe'],
      signal: options.signal,
      shell: false,
    });

    let stdout = '';
    let stderr = '';
    const injected = Object.values(options.env ?? {});

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    if (options.stdin) {
      proc.stdin.write(options.stdin);
    }
    proc.stdin.end();

    proc.on('close', (code) => {
      resolve({
        stdout,
        stderr: scrubSecrets(stderr, injected),
        exitCode: code ?? 1,
      });
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      if (error.name === 'AbortError') {
        reject(error);
        return;
      }
      if (error.code === 'ENOENT') {
        resolve({
          stdout: '',
          stderr: `${command}: command not found`,
          exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
        });
        return;
      }
      resolve({
        stdout: '',
        stderr: `Failed to execute command: ${error.message}`,
        exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
      });
    });
  });
};
