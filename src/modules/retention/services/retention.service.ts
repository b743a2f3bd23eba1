import { getUnixTime } from 'date-fns';

import type { AppConfig, RetentionResult } from '../../../types/mixed';
import { Logger } from '../../../infrastructure/logger';
import { ToolRunner } from '../../../infrastructure/tool-runner';
import { formattedTimestamp } from '../../../utils/formatted-timestamp';
import { rcloneDeleteArgs, rcloneListArgs, remoteDestination, remoteFilePath } from '../../backup/domain/tool-commands';
import { PipelineStage } from '../../backup/stages/pipeline-stage';
import { extractArtifactTimestamp, isExpired } from '../domain/artifact-timestamp';
import { parseRemoteListing } from '../domain/remote-listing';
import { parseRetentionPeriod } from '../domain/retention-period';

/**
 * Deletes remote artifacts whose embedded timestamp is older than `RETENTION_PERIOD`.
 * Listing and deletions go straight to the storage client on every run; deletions are
 * issued one by one as they are found.
 */
export class RetentionService extends PipelineStage<void, RetentionResult> {
  constructor(
    config: AppConfig,
    runner: ToolRunner,
    logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {
    super(config, runner, logger);
  }

  async execute(): Promise<RetentionResult> {
    const { storage, tools, retentionPeriod } = this.config;
    const destination = remoteDestination(storage);

    this.logger.info(
      `Removing prior dump files at '${destination}' beyond the retention period of: '${retentionPeriod}'`,
    );
    const period = parseRetentionPeriod(retentionPeriod);
    const thresholdSeconds = period.seconds;
    this.logger.info(`Using a maximum retention seconds of: ${thresholdSeconds} (${retentionPeriod})`);

    const now = getUnixTime(this.clock());

    this.logger.info(`Fetching a list of dump files at: ${destination}`);
    const { stdout } = await this.invoke(tools.rclone, rcloneListArgs(storage));
    const listed = parseRemoteListing(stdout);
    this.logger.info(`${listed.length} dump files at: ${destination}`);

    const result: RetentionResult = { thresholdSeconds, now, listed, deleted: [], retained: [], skipped: [] };

    this.logger.info(`Comparing dump file timestamps against: ${now} (${formattedTimestamp(now)})`);
    for (const name of listed) {
      const timestamp = extractArtifactTimestamp(name);
      if (timestamp === null) {
        this.logger.debug(`Skipping '${name}': no timestamp in name`);
        result.skipped.push(name);
        continue;
      }

      if (!isExpired(timestamp, now, thresholdSeconds)) {
        result.retained.push(name);
        continue;
      }

      const age = now - timestamp;
      this.logger.info(`Dump file '${name}' has aged ${age} seconds (${formattedTimestamp(timestamp)})`);
      this.logger.info(`Removing dump file at: ${remoteFilePath(storage, name)}`);
      await this.invoke(tools.rclone, rcloneDeleteArgs(storage, name));
      result.deleted.push(name);
    }

    this.logger.info(
      `Retention complete: ${result.deleted.length} deleted, ${result.retained.length} retained, ${result.skipped.length} skipped`,
    );
    return result;
  }
}
