/**
 * Process execution helpers for the external video tools (ffmpeg, the
 * watermark eraser, the enhancer).
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** 124 when the process was killed by the timeout */
  exitCode: number;
}

export interface RunCommandOptions {
  cwd?: string;
  /** Timeout in ms. Default: 30 minutes. Use 0 for no timeout. */
  timeoutMs?: number;
  /** Called for every stderr line while the process runs */
  onStderrLine?: (line: string) => void;
  /** Called for every stdout line while the process runs */
  onStdoutLine?: (line: string) => void;
}

export type CommandRunner = (
  bin: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

export type CommandProbe = (name: string) => Promise<boolean>;

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Spawn a command without a shell and stream its output line by line.
 * Resolves on any exit code; rejects only when the process cannot start.
 */
export const runCommand: CommandRunner = (bin, args, options = {}) => {
  const { cwd, timeoutMs = DEFAULT_TIMEOUT_MS, onStderrLine, onStdoutLine } = options;

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(bin, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutLines: string[] = [];
    const stderrLines: string[] = [];

    let timer: ReturnType<typeof setTimeout> | undefined;
    let killed = false;
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        killed = true;
        child.kill('SIGTERM');
      }, timeoutMs);
    }

    createInterface({ input: child.stdout }).on('line', (line) => {
      stdoutLines.push(line);
      onStdoutLine?.(line);
    });

    // ffmpeg separates progress updates with \r, which readline also treats as a line end
    createInterface({ input: child.stderr }).on('line', (line) => {
      stderrLines.push(line);
      onStderrLine?.(line);
    });

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on('close', (code, signal) => {
      if (timer) clearTimeout(timer);

      let exitCode = code ?? 1;
      if (killed || signal) {
        exitCode = 124;
      }

      resolve({
        stdout: stdoutLines.join('\n'),
        stderr: stderrLines.join('\n'),
        exitCode,
      });
    });
  });
};

/**
 * Check if a CLI tool is available on PATH
 */
export const hasCommand: CommandProbe = async (name) => {
  try {
    // The name goes in as $1 so the shell never parses it
    const result = await runCommand('sh', ['-c', 'command -v "$1"', 'sh', name], { timeoutMs: 5000 });
    return result.exitCode === 0;
  } catch (error) {
    console.error(`[Shell] Could not probe for ${name}:`, error);
    return false;
  }
};

/**
 * Last lines of a command's stderr, for error messages
 */
export function stderrTail(stderr: string, maxLength: number = 500): string {
  const trimmed = stderr.trim();
  return trimmed.length > maxLength ? trimmed.slice(-maxLength) : trimmed;
}
