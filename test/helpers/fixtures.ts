import type { AppConfig } from '../../src/types/mixed';
import { EnvSchema } from '../../src/config/config.schema';
import { Logger } from '../../src/infrastructure/logger';

export const REMOTE = 'r2:backups/mongo/shop';

export function validEnv(overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return {
    RCLONE_CONF: '/etc/rclone/rclone.conf',
    OSS: 'r2',
    OSS_BUCKET: 'backups',
    OSS_PATH: '/mongo/shop',
    MONGO_DB: 'shop',
    MONGO_COL: 'orders',
    MONGO_URI: 'mongodb://db.example.internal:27017',
    MONGO_RO_USERNAME: 'backup-ro',
    MONGO_RO_PASSWORD: 'test-password',
    ENCRYPTION_PUBLIC_KEY: 'age1testrecipient',
    RETENTION_PERIOD: '7d',
    ...overrides,
  };
}

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return EnvSchema.parse(validEnv(overrides));
}

export function testLogger(): Logger {
  return new Logger({ prefix: 'test' });
}

/** Mutes console output for the current test file; returns the `console.log` spy. */
export function silenceConsole(): jest.SpyInstance {
  jest.spyOn(console, 'info').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  return jest.spyOn(console, 'log').mockImplementation(() => undefined);
}
