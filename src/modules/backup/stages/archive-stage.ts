import * as fs from 'fs';

import { tarArgs } from '../domain/tool-commands';
import { PipelineStage } from './pipeline-stage';

/**
 * Packs the dump directory into `<dump>.tgz`. The directory is removed only once the
 * archive is confirmed on disk.
 */
export class ArchiveStage extends PipelineStage<string, string> {
  async execute(dumpPath: string): Promise<string> {
    const archivePath = `${dumpPath}.tgz`;

    this.logger.startSpinner(`Packing and compressing dump files at: ${dumpPath}`);
    await this.invoke(this.config.tools.tar, tarArgs(dumpPath, archivePath));
    this.verifyFile(archivePath);
    this.logger.succeedSpinner(`Dump files packed/compressed at: ${archivePath}`);

    this.logger.info(`Removing the uncompressed dump files at: ${dumpPath}`);
    fs.rmSync(dumpPath, { recursive: true, force: true });
    return archivePath;
  }
}
