import * as fs from 'fs';

import type { AppConfig, ToolResult } from '../../../types/mixed';
import { ArtifactVerificationError, ToolFailureError } from '../../../infrastructure/errors';
import { Logger } from '../../../infrastructure/logger';
import { ToolRunner } from '../../../infrastructure/tool-runner';
import { formatCommand } from '../../../utils/format-command';

export abstract class PipelineStage<TInput, TOutput> {
  constructor(
    protected readonly config: AppConfig,
    protected readonly runner: ToolRunner,
    protected readonly logger: Logger,
  ) {}

  /**
   * Runs the stage.
   * @throws {@link ToolFailureError} on a non-zero exit, {@link ArtifactVerificationError}
   * when the expected output is missing afterwards.
   */
  abstract execute(input: TInput): Promise<TOutput>;

  /**
   * Runs a tool and treats any non-zero exit as fatal. Values in `secrets` are masked in
   * the logged command line.
   */
  protected async invoke(executable: string, args: string[], secrets: string[] = []): Promise<ToolResult> {
    this.logger.snippet(formatCommand(executable, args, secrets));
    const result = await this.runner.run(executable, args).catch((error: unknown) => {
      this.logger.stopSpinner();
      throw error;
    });
    if (result.exitCode !== 0) {
      this.logger.stopSpinner();
      throw new ToolFailureError(executable, result.exitCode, result.stderr);
    }
    return result;
  }

  protected verifyFile(filePath: string): void {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      this.logger.stopSpinner();
      throw new ArtifactVerificationError(filePath);
    }
  }

  protected verifyDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
      this.logger.stopSpinner();
      throw new ArtifactVerificationError(dirPath);
    }
  }
}
