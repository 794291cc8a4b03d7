import { Injectable, Logger } from '@nestjs/common';
import { LedgerError, errorMessage } from '../common/errors';
import { ProcessingRecord } from '../common/interfaces/pipeline.interface';
import { LedgerDatabaseService, ProcessedVideoRow } from './ledger-database.service';

function toRecord(row: ProcessedVideoRow): ProcessingRecord {
  return {
    sourceVideoId: row.source_video_id,
    processedAt: row.processed_at,
    outputVideoId: row.output_video_id,
  };
}

/**
 * Durable set of processed source videos.
 *
 * Existing ids are replayed into memory on open; membership checks never
 * touch the disk. Records are only ever inserted, never updated, so a
 * crash between encode and record is recovered by running again.
 */
@Injectable()
export class ProcessingLedgerService {
  private readonly logger = new Logger(ProcessingLedgerService.name);
  private ids: Set<string> | null = null;

  constructor(private readonly database: LedgerDatabaseService) {}

  /**
   * Open the store and load every recorded id. Returns the number loaded.
   */
  open(): number {
    return this.index().size;
  }

  has(sourceVideoId: string): boolean {
    return this.index().has(sourceVideoId);
  }

  /**
   * Record a video as processed. Recording an id twice keeps the first
   * record and does not raise.
   */
  record(sourceVideoId: string, outputVideoId: string | null, processedAt: Date = new Date()): void {
    const ids = this.index();

    try {
      const result = this.database.connection()
        .prepare<[string, string, string | null]>(
          'INSERT OR IGNORE INTO processed_videos (source_video_id, processed_at, output_video_id) VALUES (?, ?, ?)',
        )
        .run(sourceVideoId, processedAt.toISOString(), outputVideoId);

      if (result.changes === 0) {
        this.logger.debug(`[${sourceVideoId}] Already recorded`);
      }
    } catch (error) {
      throw new LedgerError('WriteFailure', `[${sourceVideoId}] Could not write ledger record: ${errorMessage(error)}`, error);
    }

    ids.add(sourceVideoId);
    this.logger.log(`[${sourceVideoId}] Recorded as processed${outputVideoId ? ` (output ${outputVideoId})` : ''}`);
  }

  get(sourceVideoId: string): ProcessingRecord | null {
    const row = this.database.connection()
      .prepare<[string], ProcessedVideoRow>(
        'SELECT source_video_id, processed_at, output_video_id FROM processed_videos WHERE source_video_id = ?',
      )
      .get(sourceVideoId);
    return row ? toRecord(row) : null;
  }

  list(): ProcessingRecord[] {
    return this.database.connection()
      .prepare<[], ProcessedVideoRow>(
        'SELECT source_video_id, processed_at, output_video_id FROM processed_videos ORDER BY processed_at, source_video_id',
      )
      .all()
      .map(toRecord);
  }

  private index(): Set<string> {
    if (!this.ids) {
      const rows = this.database.connection()
        .prepare<[], Pick<ProcessedVideoRow, 'source_video_id'>>('SELECT source_video_id FROM processed_videos')
        .all();
      this.ids = new Set(rows.map(row => row.source_video_id));
      this.logger.log(`Loaded ${this.ids.size} processed video(s) from ledger`);
    }
    return this.ids;
  }
}
