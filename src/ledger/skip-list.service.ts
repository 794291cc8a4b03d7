import { Inject, Injectable, Logger } from '@nestjs/common';
import { LedgerError, errorMessage } from '../common/errors';
import { SkipEntry } from '../common/interfaces/pipeline.interface';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline-config';
import { LedgerDatabaseService, SkippedVideoRow } from './ledger-database.service';

/**
 * Short-lived negative cache for source videos that could not be found.
 * An entry hides the video from passes until it expires; it is never a
 * ledger record.
 */
@Injectable()
export class SkipListService {
  private readonly logger = new Logger(SkipListService.name);

  constructor(
    private readonly database: LedgerDatabaseService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  skip(sourceVideoId: string, reason: string, now: Date = new Date()): SkipEntry {
    const skippedUntil = new Date(now.getTime() + this.config.notFoundTtlHours * 3600 * 1000).toISOString();

    try {
      this.database.connection()
        .prepare<[string, string, string]>(
          `INSERT INTO skipped_videos (source_video_id, reason, skipped_until) VALUES (?, ?, ?)
           ON CONFLICT(source_video_id) DO UPDATE SET reason = excluded.reason, skipped_until = excluded.skipped_until`,
        )
        .run(sourceVideoId, reason, skippedUntil);
    } catch (error) {
      throw new LedgerError('WriteFailure', `[${sourceVideoId}] Could not write skip entry: ${errorMessage(error)}`, error);
    }

    this.logger.log(`[${sourceVideoId}] Skipped until ${skippedUntil}: ${reason}`);
    return { sourceVideoId, reason, skippedUntil };
  }

  /**
   * True while an unexpired entry exists. Expired entries are removed.
   */
  isSkipped(sourceVideoId: string, now: Date = new Date()): boolean {
    const entry = this.get(sourceVideoId);
    if (!entry) return false;

    if (Date.parse(entry.skippedUntil) > now.getTime()) {
      return true;
    }

    this.database.connection()
      .prepare<[string]>('DELETE FROM skipped_videos WHERE source_video_id = ?')
      .run(sourceVideoId);
    this.logger.debug(`[${sourceVideoId}] Skip entry expired`);
    return false;
  }

  get(sourceVideoId: string): SkipEntry | null {
    const row = this.database.connection()
      .prepare<[string], SkippedVideoRow>(
        'SELECT source_video_id, reason, skipped_until FROM skipped_videos WHERE source_video_id = ?',
      )
      .get(sourceVideoId);

    return row
      ? { sourceVideoId: row.source_video_id, reason: row.reason, skippedUntil: row.skipped_until }
      : null;
  }
}
