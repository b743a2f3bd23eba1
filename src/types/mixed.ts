export interface MongoSourceConfig {
  uri: string;
  database: string;
  collection: string;
  username: string;
  password: string;
  authenticationDatabase: string;
}

export interface StorageConfig {
  /** rclone remote name, e.g. `r2`. */
  service: string;
  bucket: string;
  /** Prefix inside the bucket, appended to the bucket name as given. */
  path: string;
  rcloneConfigPath: string;
}

export interface EncryptionConfig {
  /** age recipient (public key). */
  recipient: string;
}

export interface ToolPaths {
  mongodump: string;
  tar: string;
  age: string;
  rclone: string;
}

export interface AppConfig {
  mongo: MongoSourceConfig;
  storage: StorageConfig;
  encryption: EncryptionConfig;
  retentionPeriod: string;
  dumpNameFormat: string;
  tools: ToolPaths;
}

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type PipelineState =
  | 'validating'
  | 'dumping'
  | 'archiving'
  | 'encrypting'
  | 'uploading'
  | 'pruning'
  | 'done'
  | 'failed';

export type RetentionUnit = 'd' | 'h' | 'm';

export interface RetentionPeriod {
  magnitude: number;
  unit: RetentionUnit;
  /** magnitude × seconds per unit */
  seconds: number;
}

export interface RetentionResult {
  thresholdSeconds: number;
  /** Unix seconds the ages were measured against. */
  now: number;
  listed: string[];
  deleted: string[];
  retained: string[];
  /** Names without an embedded timestamp; never deleted. */
  skipped: string[];
}

export interface BackupReport {
  artifactName: string;
  remotePath: string;
  retention: RetentionResult;
}
