/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(`${command} failed with exit code ${exitCode}: ${stderr.trim().slice(-500)}`);
    this.name = 'CommandFailedError';
  }
}

/**
 * Execute an external command safely
 *
 * @param command - The command to execute
 * @param args - Command arguments
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    timeout = 300000, // 5 minutes default
    maxOutputSize = 1024 * 1024,
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    const onAbort = () => child.kill('SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}

/**
 * Execute ffmpeg, throwing CommandFailedError on a non-zero exit
 *
 * @param args - ffmpeg arguments (NOT including the binary)
 */
export async function execFFmpeg(
  args: string[],
  options: CommandOptions & { binary?: string } = {}
): Promise<CommandResult> {
  const { binary = 'ffmpeg', ...rest } = options;
  const result = await executeCommand(binary, args, {
    timeout: 600000,
    ...rest,
  });

  if (result.exitCode !== 0) {
    throw new CommandFailedError(binary, result.exitCode, result.stderr || result.stdout);
  }

  return result;
}
