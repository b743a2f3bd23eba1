import type { AppConfig } from '../types/mixed';
import { EnvSchema } from '../config/config.schema';
import { ConfigurationError } from './errors';
import { Logger } from './logger';

export class Config {
  private readonly _parsed: AppConfig;

  constructor(
    env: NodeJS.ProcessEnv,
    protected readonly logger: Logger,
  ) {
    this._parsed = this.load(env);
  }

  get parsed(): AppConfig {
    return this._parsed;
  }

  /**
   * Validates the process environment and maps it into the nested {@link AppConfig}.
   * Every problem is logged before a single {@link ConfigurationError} is thrown.
   */
  load(env: NodeJS.ProcessEnv): AppConfig {
    this.logger.debug('Checking required environment variables');

    const validationResult = EnvSchema.safeParse(env);
    if (!validationResult.success) {
      const messages = validationResult.error.errors.map((err) => err.message);
      messages.forEach((message) => this.logger.error(message));
      throw new ConfigurationError(messages.join('; '));
    }

    this.logger.debug('Environment variables present');
    const { data } = validationResult;
    return Object.freeze({
      ...data,
      mongo: Object.freeze(data.mongo),
      storage: Object.freeze(data.storage),
      encryption: Object.freeze(data.encryption),
      tools: Object.freeze(data.tools),
    });
  }
}
