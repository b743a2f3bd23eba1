import * as path from 'path';

import { mongodumpArgs, mongodumpSecrets } from '../domain/tool-commands';
import { PipelineStage } from './pipeline-stage';

export interface DumpInput {
  workDir: string;
  artifactName: string;
}

/**
 * Dumps the configured collection with read-only credentials into `<workDir>/<artifactName>`.
 */
export class DumpStage extends PipelineStage<DumpInput, string> {
  async execute({ workDir, artifactName }: DumpInput): Promise<string> {
    const { mongo, tools } = this.config;
    const outputPath = path.join(workDir, artifactName);

    this.logger.startSpinner(`Dumping '${mongo.database}.${mongo.collection}' to: ${outputPath}`);
    await this.invoke(tools.mongodump, mongodumpArgs(mongo, outputPath), mongodumpSecrets(mongo));
    this.verifyDirectory(outputPath);

    this.logger.succeedSpinner(`Collection '${mongo.database}.${mongo.collection}' dumped to: ${outputPath}`);
    return outputPath;
  }
}
