#!/usr/bin/env node
import 'source-map-support/register';
import { Logger } from '../infrastructure/logger';
import { SpawnToolRunner } from '../infrastructure/tool-runner';
import { WorkingDirectory } from '../infrastructure/working-directory';
import { BackupService } from '../modules/backup/services/backup.service';
import { BackupApp } from './backup-app';

const APP_NAME = 'mongodump-offsite';

async function main() {
  const debug = ['1', 'true'].includes((process.env.DEBUG ?? '').toLowerCase());
  const logger = new Logger({ prefix: APP_NAME, debug });
  const runner = new SpawnToolRunner(logger.child(SpawnToolRunner.name));

  const app = new BackupApp({
    service: new BackupService({
      runner,
      logger,
      workingDirectory: new WorkingDirectory(logger.child(WorkingDirectory.name)),
    }),
    logger,
    terminateTools: () => runner.terminateActive(),
    exit: (code) => process.exit(code),
  });

  await app.run(process.env);
}

void main();
