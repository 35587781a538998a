/**
 * Tool Shell Executor
 *
 * Runs the local development tools (composer, ddev, lando, drush).
 *
 * SECURITY:
 * - Whitelisted executables only (no arbitrary shell)
 * - Uses spawn() (no shell injection)
 * - Timeout enforcement, abort support and output cap
 */

import { spawn } from 'child_process';
import { basename } from 'path';
import { logger } from '../utils/logger.js';
import type { Config, ShellCommandResult, ShellOptions, ShellRunner } from '../types/index.js';

const BASE_EXECUTABLES = ['composer', 'ddev', 'lando', 'drush'];

const KILL_GRACE_MS = 5000;

export function allowedExecutables(tools: Config['tools']): Set<string> {
  return new Set([...BASE_EXECUTABLES, tools.composer, tools.ddev, tools.lando, tools.drush]);
}

function blockedResult(command: string, stderr: string): ShellCommandResult {
  return {
    success: false,
    stdout: '',
    stderr,
    exitCode: null,
    timedOut: false,
    aborted: false,
    notFound: false,
    duration_ms: 0,
    command,
  };
}

/**
 * Build a runner bound to a tool configuration. The runner never rejects:
 * every outcome, including a missing binary, comes back as a result.
 */
export function createShellRunner(tools: Config['tools'], shell: Config['shell']): ShellRunner {
  const allowed = allowedExecutables(tools);

  return (executable: string, args: string[], options: ShellOptions = {}): Promise<ShellCommandResult> => {
    const fullCommand = [executable, ...args].join(' ');

    if (!allowed.has(executable) && !allowed.has(basename(executable))) {
      logger.warn('Blocked non-whitelisted executable', { executable, args });
      return Promise.resolve(blockedResult(fullCommand, `Executable not allowed: ${executable}`));
    }

    if (options.signal?.aborted) {
      return Promise.resolve({ ...blockedResult(fullCommand, 'Aborted before start'), aborted: true });
    }

    const startTime = Date.now();
    const timeout = options.timeout ?? shell.timeout_ms;
    const maxOutput = options.maxOutput ?? shell.max_output_chars;

    logger.debug('Executing tool command', { command: fullCommand, cwd: options.cwd });

    return new Promise<ShellCommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;

      const proc = spawn(executable, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env },
      });

      const terminate = () => {
        proc.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (proc.exitCode === null) proc.kill('SIGKILL');
        }, KILL_GRACE_MS);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeout);

      const onAbort = () => {
        aborted = true;
        terminate();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
        if (stdout.length > maxOutput) {
          stdout = stdout.substring(0, maxOutput) + '\n... (output truncated)';
        }
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
        if (stderr.length > maxOutput) {
          stderr = stderr.substring(0, maxOutput) + '\n... (output truncated)';
        }
      });

      proc.on('close', (code) => {
        cleanup();
        const duration_ms = Date.now() - startTime;
        const success = code === 0 && !timedOut && !aborted;

        if (timedOut) {
          logger.warn('Tool command timed out', { command: fullCommand, timeout });
        } else {
          logger.debug('Tool command completed', { command: fullCommand, exitCode: code, duration_ms });
        }

        resolve({
          success,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code,
          timedOut,
          aborted,
          notFound: false,
          duration_ms,
          command: fullCommand,
        });
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        cleanup();
        const notFound = error.code === 'ENOENT';
        logger.error('Tool command failed to start', { command: fullCommand, error: String(error) });

        resolve({
          success: false,
          stdout: '',
          stderr: notFound ? `${executable}: command not found` : `Failed to execute: ${error.message}`,
          exitCode: null,
          timedOut: false,
          aborted,
          notFound,
          duration_ms: Date.now() - startTime,
          command: fullCommand,
        });
      });
    });
  };
}
