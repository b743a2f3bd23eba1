import { ChildProcess, spawn } from 'child_process';

import type { ToolResult } from '../types/mixed';
import { findExecutable } from '../utils/find-executable';
import { Logger } from './logger';

/**
 * The only way the pipeline touches external binaries. Tests swap in a fake.
 */
export interface ToolRunner {
  /**
   * Runs the executable to completion.
   * Resolves with its exit status and captured output whatever the exit code; rejects only
   * when the process could not be started.
   */
  run(executable: string, args: string[]): Promise<ToolResult>;

  isAvailable(executable: string): boolean;
}

export class SpawnToolRunner implements ToolRunner {
  private active: ChildProcess | null = null;

  constructor(private readonly logger: Logger) {}

  /**
   * Signals the tool currently running, if any. Used before the process exits on a
   * termination signal so no tool keeps writing into the working directory.
   */
  terminateActive(signal: NodeJS.Signals = 'SIGTERM'): void {
    if (this.active && this.active.exitCode === null && this.active.signalCode === null) {
      this.logger.warn(`Stopping ${this.active.spawnfile} (${signal})`);
      this.active.kill(signal);
    }
    this.active = null;
  }

  isAvailable(executable: string): boolean {
    return findExecutable(executable) !== null;
  }

  run(executable: string, args: string[]): Promise<ToolResult> {
    // No shell: arguments reach the tool verbatim, so URIs and passwords need no quoting.
    const child = spawn(executable, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.active = child;
    // Decode across chunk boundaries; a multi-byte character may span two reads.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    return new Promise<ToolResult>((resolve, reject) => {
      let stdoutData = '';
      let stderrData = '';

      child.stdout.on('data', (text: string) => {
        stdoutData += text;
      });

      child.stderr.on('data', (text: string) => {
        stderrData += text;
        this.logger.debug(`${executable}: ${text.trim()}`);
      });

      child.on('close', (code, signal) => {
        this.release(child);
        if (code === null) {
          this.logger.warn(`${executable} was terminated by ${signal ?? 'an unknown signal'}`);
        }
        resolve({ exitCode: code ?? 1, stdout: stdoutData, stderr: stderrData });
      });

      child.on('error', (error) => {
        this.release(child);
        reject(new Error(`Failed to start ${executable}: ${error.message}`, { cause: error }));
      });
    });
  }

  private release(child: ChildProcess): void {
    if (this.active === child) {
      this.active = null;
    }
  }
}
