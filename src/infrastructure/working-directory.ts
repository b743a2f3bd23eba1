import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Logger } from './logger';

const DIRECTORY_PREFIX = 'mongodump-offsite-';

/**
 * Process-exclusive scratch directory for intermediate artifacts.
 *
 * While acquired, a process `exit` listener guarantees removal even when the run is cut
 * short by `process.exit` (fatal errors, termination signals).
 */
export class WorkingDirectory {
  private dirPath: string | null = null;
  private readonly onExit = () => this.release();

  constructor(
    private readonly logger: Logger,
    private readonly parentDir: string = os.tmpdir(),
  ) {}

  get path(): string | null {
    return this.dirPath;
  }

  acquire(): string {
    if (this.dirPath) {
      return this.dirPath;
    }
    this.dirPath = fs.mkdtempSync(path.join(this.parentDir, DIRECTORY_PREFIX));
    process.once('exit', this.onExit);
    this.logger.debug(`Created working directory: ${this.dirPath}`);
    return this.dirPath;
  }

  release(): void {
    if (!this.dirPath) {
      return;
    }
    const dirPath = this.dirPath;
    this.dirPath = null;
    process.removeListener('exit', this.onExit);
    fs.rmSync(dirPath, { recursive: true, force: true });
    this.logger.debug(`Removed working directory: ${dirPath}`);
  }
}

/**
 * Runs `fn` inside a freshly acquired working directory and releases it afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withWorkingDirectory<T>(
  workingDirectory: WorkingDirectory,
  fn: (dirPath: string) => Promise<T>,
): Promise<T> {
  const dirPath = workingDirectory.acquire();
  try {
    return await fn(dirPath);
  } finally {
    workingDirectory.release();
  }
}
