import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline-config';

// Type definitions for database records
export interface ProcessedVideoRow {
  source_video_id: string;
  processed_at: string;
  output_video_id: string | null;
}

export interface SkippedVideoRow {
  source_video_id: string;
  reason: string;
  skipped_until: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS processed_videos (
    source_video_id TEXT PRIMARY KEY,
    processed_at TEXT NOT NULL,
    output_video_id TEXT
  );

  CREATE TABLE IF NOT EXISTS skipped_videos (
    source_video_id TEXT PRIMARY KEY,
    reason TEXT NOT NULL,
    skipped_until TEXT NOT NULL
  );
`;

/**
 * LedgerDatabaseService - Owns the SQLite file behind the processing ledger
 * and the skip list. Opened on first use, closed with the module.
 */
@Injectable()
export class LedgerDatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(LedgerDatabaseService.name);
  private db: Database.Database | null = null;

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  get dbPath(): string {
    return this.config.ledgerPath;
  }

  connection(): Database.Database {
    if (!this.db) {
      this.db = this.open();
    }
    return this.db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.logger.log('Ledger database closed');
    }
  }

  onModuleDestroy(): void {
    this.close();
  }

  private open(): Database.Database {
    const dbPath = this.dbPath;

    // Ensure parent directory exists
    const parentDir = path.dirname(dbPath);
    if (!fs.existsSync(parentDir)) {
      fs.mkdirSync(parentDir, { recursive: true });
    }

    const isNew = !fs.existsSync(dbPath);
    const db = new Database(dbPath);

    // Every committed record must survive a crash
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
    db.exec(SCHEMA);

    this.logger.log(`${isNew ? 'Created new' : 'Opened existing'} ledger database: ${dbPath}`);
    return db;
  }
}
