import type { AppConfig } from '../../../types/mixed';
import { Config } from '../../../infrastructure/config';
import { ConfigurationError } from '../../../infrastructure/errors';
import { Logger } from '../../../infrastructure/logger';
import { ToolRunner } from '../../../infrastructure/tool-runner';

/**
 * Fail-fast gate in front of the pipeline: all required variables set, then the
 * storage client, dump and encryption executables resolvable. Nothing is run here.
 */
export class EnvironmentValidator {
  constructor(
    private readonly runner: ToolRunner,
    private readonly logger: Logger,
  ) {}

  validate(env: NodeJS.ProcessEnv): AppConfig {
    this.logger.info('Checking dependencies');
    const config = new Config(env, this.logger).parsed;

    const { rclone, mongodump, age } = config.tools;
    for (const tool of [rclone, mongodump, age]) {
      if (!this.runner.isAvailable(tool)) {
        throw new ConfigurationError(`${tool} is not installed. Aborting.`);
      }
      this.logger.debug(`Found executable: ${tool}`);
    }

    return config;
  }
}
