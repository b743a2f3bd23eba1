import * as path from 'path';

import { rcloneCopyArgs, remoteDestination, remoteFilePath } from '../domain/tool-commands';
import { PipelineStage } from './pipeline-stage';

/**
 * Copies the encrypted artifact to object storage. The local file is left for the
 * working-directory teardown.
 *
 * @returns The remote path of the uploaded artifact.
 */
export class UploadStage extends PipelineStage<string, string> {
  async execute(filePath: string): Promise<string> {
    const { storage, tools } = this.config;
    const fileName = path.basename(filePath);

    this.logger.startSpinner(`Uploading '${fileName}' to: ${remoteDestination(storage)}`);
    await this.invoke(tools.rclone, rcloneCopyArgs(storage, filePath));

    const remotePath = remoteFilePath(storage, fileName);
    this.logger.succeedSpinner(`Dump file uploaded: ${remotePath}`);
    return remotePath;
  }
}
