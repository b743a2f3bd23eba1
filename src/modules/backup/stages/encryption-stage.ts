import * as fs from 'fs';

import { ageArgs } from '../domain/tool-commands';
import { PipelineStage } from './pipeline-stage';

/**
 * Encrypts the archive for the configured age recipient into `<archive>.enc` and removes
 * the plaintext once the ciphertext exists.
 */
export class EncryptionStage extends PipelineStage<string, string> {
  async execute(archivePath: string): Promise<string> {
    const encryptedPath = `${archivePath}.enc`;

    this.logger.startSpinner(`Encrypting the dump file: ${archivePath}`);
    await this.invoke(this.config.tools.age, ageArgs(this.config.encryption.recipient, archivePath, encryptedPath));
    this.verifyFile(encryptedPath);
    this.logger.succeedSpinner(`Encrypted dump file at: ${encryptedPath}`);

    this.logger.info(`Removing the unprotected dump file: ${archivePath}`);
    fs.rmSync(archivePath, { force: true });
    return encryptedPath;
  }
}
