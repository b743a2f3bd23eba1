import * as path from 'path';
import { getUnixTime } from 'date-fns';

import type { AppConfig, BackupReport, PipelineState } from '../../../types/mixed';
import { Logger } from '../../../infrastructure/logger';
import { ToolRunner } from '../../../infrastructure/tool-runner';
import { WorkingDirectory, withWorkingDirectory } from '../../../infrastructure/working-directory';
import { formatFilename } from '../../../utils/format-filename';
import { RetentionService } from '../../retention/services/retention.service';
import { PipelineStateMachine } from '../domain/pipeline-state-machine';
import { ArchiveStage } from '../stages/archive-stage';
import { DumpStage } from '../stages/dump-stage';
import { EncryptionStage } from '../stages/encryption-stage';
import { EnvironmentValidator } from '../stages/environment-validator';
import { UploadStage } from '../stages/upload-stage';

export interface BackupServiceOptions {
  runner: ToolRunner;
  logger: Logger;
  workingDirectory: WorkingDirectory;
  clock?: () => Date;
}

/**
 * Runs one backup end to end:
 * validate → dump → archive → encrypt → upload → prune.
 *
 * Every failure is fatal and propagates to the caller once the pipeline is marked `failed`;
 * the working directory is released on every path.
 */
export class BackupService {
  private readonly runner: ToolRunner;
  private readonly logger: Logger;
  private readonly workingDirectory: WorkingDirectory;
  private readonly clock: () => Date;
  readonly stateMachine: PipelineStateMachine;

  constructor(options: BackupServiceOptions) {
    this.runner = options.runner;
    this.logger = options.logger;
    this.workingDirectory = options.workingDirectory;
    this.clock = options.clock ?? (() => new Date());
    this.stateMachine = new PipelineStateMachine((from, to) => this.logger.debug(`Pipeline state: ${from} -> ${to}`));
  }

  get state(): PipelineState {
    return this.stateMachine.state;
  }

  /** The state the pipeline was in when it failed, if it did. */
  get failedStage(): PipelineState | undefined {
    const { history } = this.stateMachine;
    return this.state === 'failed' ? history[history.length - 2] : undefined;
  }

  async run(env: NodeJS.ProcessEnv): Promise<BackupReport> {
    const startedAt = getUnixTime(this.clock());

    try {
      const config = new EnvironmentValidator(this.runner, this.logger.child(EnvironmentValidator.name)).validate(env);
      const artifactName = formatFilename(config.dumpNameFormat, startedAt);

      const report = await withWorkingDirectory(this.workingDirectory, (workDir) =>
        this.runStages(config, workDir, artifactName),
      );
      this.stateMachine.transition('done');
      return report;
    } catch (error: unknown) {
      this.stateMachine.transition('failed');
      throw error;
    }
  }

  private async runStages(config: AppConfig, workDir: string, artifactName: string): Promise<BackupReport> {
    const stageLogger = (name: string) => this.logger.child(name);

    this.stateMachine.transition('dumping');
    const dumpPath = await new DumpStage(config, this.runner, stageLogger(DumpStage.name)).execute({
      workDir,
      artifactName,
    });

    this.stateMachine.transition('archiving');
    const archivePath = await new ArchiveStage(config, this.runner, stageLogger(ArchiveStage.name)).execute(dumpPath);

    this.stateMachine.transition('encrypting');
    const encryptedPath = await new EncryptionStage(config, this.runner, stageLogger(EncryptionStage.name)).execute(
      archivePath,
    );

    this.stateMachine.transition('uploading');
    const remotePath = await new UploadStage(config, this.runner, stageLogger(UploadStage.name)).execute(
      encryptedPath,
    );

    this.stateMachine.transition('pruning');
    const retention = await new RetentionService(
      config,
      this.runner,
      stageLogger(RetentionService.name),
      this.clock,
    ).execute();

    return { artifactName: path.basename(encryptedPath), remotePath, retention };
  }
}
