import type { BackupReport, PipelineState } from '../types/mixed';
import { Logger } from '../infrastructure/logger';

export const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export interface BackupRun {
  run(env: NodeJS.ProcessEnv): Promise<BackupReport>;
  readonly failedStage: PipelineState | undefined;
}

export interface BackupAppOptions {
  service: BackupRun;
  logger: Logger;
  /** Stops whichever tool is running when a termination signal arrives. */
  terminateTools: () => void;
  /** `process.exit` in production; its `exit` event removes the working directory. */
  exit: (code: number) => void;
  onSignal?: (signal: NodeJS.Signals, handler: () => void) => void;
}

/**
 * Maps one pipeline run onto the process: exit code 0 on success, 1 on any failure or
 * termination signal, with a single labelled error line.
 */
export class BackupApp {
  private readonly service: BackupRun;
  private readonly logger: Logger;
  private readonly terminateTools: () => void;
  private readonly exit: (code: number) => void;
  private readonly onSignal: (signal: NodeJS.Signals, handler: () => void) => void;

  constructor(options: BackupAppOptions) {
    this.service = options.service;
    this.logger = options.logger;
    this.terminateTools = options.terminateTools;
    this.exit = options.exit;
    this.onSignal = options.onSignal ?? ((signal, handler) => process.once(signal, handler));
  }

  async run(env: NodeJS.ProcessEnv): Promise<void> {
    for (const signal of TERMINATION_SIGNALS) {
      this.onSignal(signal, () => this.abort(signal));
    }

    try {
      const report = await this.service.run(env);
      this.logger.info(`Backup complete: ${report.remotePath}`);
      this.exit(0);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Backup failed during ${this.service.failedStage ?? 'startup'}: ${message}`);
      if (error instanceof Error && error.stack) {
        this.logger.debug(error.stack);
      }
      this.exit(1);
    }
  }

  private abort(signal: NodeJS.Signals): void {
    this.logger.error(`Received ${signal}. Aborting.`);
    this.terminateTools();
    this.exit(1);
  }
}
