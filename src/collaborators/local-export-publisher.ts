import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as lockfile from 'proper-lockfile';
import { v4 as uuidv4 } from 'uuid';
import { Compilation, PrivacyStatus, SourceVideo, UploadDetails } from '../common/interfaces/pipeline.interface';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline-config';
import { Publisher } from './interfaces/collaborators.interface';

export interface ExportEntry {
  id: string;
  sourceVideoId: string;
  file: string;
  title: string;
  description: string;
  tags: string[];
  privacy: PrivacyStatus;
  durationSeconds: number;
  exportedAt: string;
}

export interface ExportManifest {
  version: '1.0';
  lastUpdated: string;
  exports: ExportEntry[];
}

function isManifest(value: unknown): value is ExportManifest {
  return typeof value === 'object'
    && value !== null
    && 'exports' in value
    && Array.isArray(value.exports);
}

/**
 * Publishes compilations into a local export directory, next to a
 * manifest.json describing every export. The manifest is the record the
 * duplicate check reads.
 */
@Injectable()
export class LocalExportPublisher implements Publisher {
  private readonly logger = new Logger(LocalExportPublisher.name);
  private readonly exportDir: string;
  private readonly manifestPath: string;

  constructor(@Inject(PIPELINE_CONFIG) config: PipelineConfig) {
    this.exportDir = config.exportDir;
    this.manifestPath = path.join(config.exportDir, 'manifest.json');
  }

  async publish(compilation: Compilation, details: UploadDetails): Promise<string> {
    await fs.mkdir(this.exportDir, { recursive: true });

    const id = uuidv4();
    const file = `${compilation.sourceVideoId}_${id.slice(0, 8)}${path.extname(compilation.path) || '.mp4'}`;
    const target = path.join(this.exportDir, file);

    await fs.copyFile(compilation.path, target);

    try {
      await this.updateManifest(manifest => {
        manifest.exports.push({
          id,
          sourceVideoId: compilation.sourceVideoId,
          file,
          title: details.title,
          description: details.description,
          tags: details.tags,
          privacy: details.privacy,
          durationSeconds: compilation.durationSeconds,
          exportedAt: new Date().toISOString(),
        });
      });
    } catch (error) {
      await fs.rm(target, { force: true });
      throw error;
    }

    this.logger.log(`[${compilation.sourceVideoId}] Exported "${details.title}" as ${file} (${details.privacy})`);
    return id;
  }

  async findExistingUpload(video: SourceVideo, title: string): Promise<string | null> {
    const manifest = await this.readManifest();
    const wanted = title.trim().toLowerCase();
    const match = manifest.exports.find(entry =>
      entry.sourceVideoId === video.id || entry.title.trim().toLowerCase() === wanted,
    );
    return match ? match.id : null;
  }

  private async readManifest(): Promise<ExportManifest> {
    let content: string;
    try {
      content = await fs.readFile(this.manifestPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return { version: '1.0', lastUpdated: new Date().toISOString(), exports: [] };
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isManifest(parsed)) {
      throw new Error(`Export manifest is malformed: ${this.manifestPath}`);
    }
    return parsed;
  }

  /**
   * Read-modify-write under a lock, written to a temp file and renamed
   */
  private async updateManifest(update: (manifest: ExportManifest) => void): Promise<void> {
    let release: (() => Promise<void>) | undefined;

    try {
      // Acquire lock
      release = await lockfile.lock(this.manifestPath, {
        retries: {
          retries: 5,
          minTimeout: 100,
          maxTimeout: 1000,
        },
        realpath: false,
      });

      const manifest = await this.readManifest();
      update(manifest);
      manifest.lastUpdated = new Date().toISOString();

      // Write to temp file first
      const tempPath = `${this.manifestPath}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf-8');

      // Atomic rename
      await fs.rename(tempPath, this.manifestPath);
    } catch (error) {
      this.logger.error(`Failed to save export manifest: ${(error as Error).message}`);
      throw error;
    } finally {
      if (release) {
        await release();
      }
    }
  }
}
