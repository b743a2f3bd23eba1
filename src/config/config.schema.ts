import { z } from 'zod';
import type { AppConfig } from '../types/mixed';

export const REQUIRED_ENV_VARS = [
  'RCLONE_CONF',
  'OSS',
  'OSS_BUCKET',
  'OSS_PATH',
  'MONGO_DB',
  'MONGO_COL',
  'MONGO_URI',
  'MONGO_RO_USERNAME',
  'MONGO_RO_PASSWORD',
  'ENCRYPTION_PUBLIC_KEY',
  'RETENTION_PERIOD',
] as const;

export type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number];

export const TIMESTAMP_PLACEHOLDER = '{timestamp}';

const AUTHENTICATION_DATABASE = 'admin';

const requiredVar = (name: RequiredEnvVar) => {
  const message = `Missing environment variable: ${name}`;
  return z.string({ required_error: message }).min(1, message);
};

const optionalVar = (name: string, fallback: string) =>
  z
    .string()
    .min(1, `Environment variable ${name} is set but empty`)
    .optional()
    .transform((value) => value ?? fallback);

export const EnvSchema = z
  .object({
    RCLONE_CONF: requiredVar('RCLONE_CONF'),
    OSS: requiredVar('OSS'),
    OSS_BUCKET: requiredVar('OSS_BUCKET'),
    OSS_PATH: requiredVar('OSS_PATH'),
    MONGO_DB: requiredVar('MONGO_DB'),
    MONGO_COL: requiredVar('MONGO_COL'),
    MONGO_URI: requiredVar('MONGO_URI'),
    MONGO_RO_USERNAME: requiredVar('MONGO_RO_USERNAME'),
    MONGO_RO_PASSWORD: requiredVar('MONGO_RO_PASSWORD'),
    ENCRYPTION_PUBLIC_KEY: requiredVar('ENCRYPTION_PUBLIC_KEY'),
    RETENTION_PERIOD: requiredVar('RETENTION_PERIOD'),
    MONGODUMP_PATH: optionalVar('MONGODUMP_PATH', 'mongodump'),
    TAR_PATH: optionalVar('TAR_PATH', 'tar'),
    AGE_PATH: optionalVar('AGE_PATH', 'age'),
    RCLONE_PATH: optionalVar('RCLONE_PATH', 'rclone'),
    DUMP_NAME_FORMAT: optionalVar('DUMP_NAME_FORMAT', `dump-${TIMESTAMP_PLACEHOLDER}`).refine(
      (value) => value.endsWith(`-${TIMESTAMP_PLACEHOLDER}`) && !value.includes('/'),
      `DUMP_NAME_FORMAT must be a file name ending in "-${TIMESTAMP_PLACEHOLDER}"`,
    ),
  })
  .transform(
    (env): AppConfig => ({
      mongo: {
        uri: env.MONGO_URI,
        database: env.MONGO_DB,
        collection: env.MONGO_COL,
        username: env.MONGO_RO_USERNAME,
        password: env.MONGO_RO_PASSWORD,
        authenticationDatabase: AUTHENTICATION_DATABASE,
      },
      storage: {
        service: env.OSS,
        bucket: env.OSS_BUCKET,
        path: env.OSS_PATH,
        rcloneConfigPath: env.RCLONE_CONF,
      },
      encryption: {
        recipient: env.ENCRYPTION_PUBLIC_KEY,
      },
      retentionPeriod: env.RETENTION_PERIOD,
      dumpNameFormat: env.DUMP_NAME_FORMAT,
      tools: {
        mongodump: env.MONGODUMP_PATH,
        tar: env.TAR_PATH,
        age: env.AGE_PATH,
        rclone: env.RCLONE_PATH,
      },
    }),
  );
