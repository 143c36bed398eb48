/**
 * Runs external binaries (ffmpeg, image optimizers, yt-dlp) as child processes
 */

import { spawn } from 'child_process';
import { LoggingService } from './LoggingService';

/**
 * Options for one process execution
 */
export interface ProcessOptions {
  /** Working directory for the process */
  cwd?: string;
  /** Timeout in milliseconds, 0 disables it */
  timeout?: number;
}

/**
 * Result of a process execution
 */
export interface ProcessResult {
  /** Exit code, -1 when the process could not be started */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the process failed to start, timed out or exited non-zero */
  error?: Error;
}

/**
 * Anything able to run a command; the media pipeline depends on this only
 */
export interface ToolRunner {
  run(command: string, args: string[], options?: ProcessOptions): Promise<ProcessResult>;
}

/**
 * ProcessRunner spawns commands and collects their output
 */
export class ProcessRunner implements ToolRunner {
  private logger: LoggingService;

  /**
   * Creates a new ProcessRunner
   * @param logger - LoggingService instance for error/debug logging
   */
  constructor(logger: LoggingService) {
    this.logger = logger;
  }

  /**
   * Run a command and resolve once it exits. Never rejects: failures are
   * reported through the result's `error` field.
   */
  async run(command: string, args: string[], options: ProcessOptions = {}): Promise<ProcessResult> {
    return new Promise((resolve) => {
      const { cwd, timeout = 300000 } = options;

      this.logger.debug(`Executing ${command}`, { args });

      const child = spawn(command, args, { cwd: cwd || process.cwd() });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timeoutId: NodeJS.Timeout | null = null;

      if (timeout > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          this.logger.warn(`${command} timed out after ${timeout}ms`);
        }, timeout);
      }

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }

        const exitCode = code ?? -1;
        const result: ProcessResult = { exitCode, stdout, stderr };

        if (timedOut) {
          result.error = new Error(`${command} timed out`);
        } else if (exitCode !== 0) {
          this.logger.debug(`${command} exited with code ${exitCode}`, { stderr });
          result.error = new Error(`${command} exited with code ${exitCode}`);
        }

        resolve(result);
      });

      child.on('error', (error: Error) => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }

        this.logger.error(`Failed to execute ${command}`, error);

        resolve({
          exitCode: -1,
          stdout,
          stderr,
          error,
        });
      });
    });
  }

  /**
   * Check whether a binary can be started
   */
  async isAvailable(command: string, versionFlag = '--version'): Promise<boolean> {
    const result = await this.run(command, [versionFlag], { timeout: 10000 });
    return result.exitCode !== -1;
  }
}
