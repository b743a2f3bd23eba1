import type { MongoSourceConfig, StorageConfig } from '../../../types/mixed';

/**
 * Argument builders for every external tool the job runs. Kept free of I/O so the exact
 * command lines can be asserted in tests.
 */

export function mongodumpArgs(source: MongoSourceConfig, outputPath: string): string[] {
  return [
    `--uri=${source.uri}`,
    `--authenticationDatabase=${source.authenticationDatabase}`,
    `--db=${source.database}`,
    `--collection=${source.collection}`,
    `--username=${source.username}`,
    `--password=${source.password}`,
    `--out=${outputPath}`,
  ];
}

const URI_USERINFO = /^mongodb(?:\+srv)?:\/\/([^@/?#]+)@/;

/**
 * Values to mask when logging a mongodump command line: the password and any
 * `user:password` embedded in the connection string.
 */
export function mongodumpSecrets(source: MongoSourceConfig): string[] {
  const userInfo = URI_USERINFO.exec(source.uri)?.[1];
  return userInfo ? [userInfo, source.password] : [source.password];
}

/**
 * Archive entries are relative to the dump directory (`./<db>/<collection>.bson`), so the
 * temporary working-directory path never ends up inside the archive.
 */
export function tarArgs(sourceDir: string, archivePath: string): string[] {
  return ['--create', '--gzip', `--file=${archivePath}`, `--directory=${sourceDir}`, '.'];
}

export function ageArgs(recipient: string, inputPath: string, outputPath: string): string[] {
  return [`--recipient=${recipient}`, `--output=${outputPath}`, inputPath];
}

/** `<service>:<bucket><path>`; bucket and path are concatenated as configured. */
export function remoteDestination(storage: StorageConfig): string {
  return `${storage.service}:${storage.bucket}${storage.path}`;
}

export function remoteFilePath(storage: StorageConfig, fileName: string): string {
  return `${remoteDestination(storage).replace(/\/+$/, '')}/${fileName}`;
}

export function rcloneCopyArgs(storage: StorageConfig, localPath: string): string[] {
  return ['--config', storage.rcloneConfigPath, 'copy', localPath, remoteDestination(storage)];
}

export function rcloneListArgs(storage: StorageConfig): string[] {
  return ['--config', storage.rcloneConfigPath, 'ls', remoteDestination(storage)];
}

export function rcloneDeleteArgs(storage: StorageConfig, fileName: string): string[] {
  return ['--config', storage.rcloneConfigPath, 'delete', remoteFilePath(storage, fileName)];
}
