// src/config/pipeline-config.ts
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { ConfigValidationError } from '../common/errors';
import { PrivacyStatus } from '../common/interfaces/pipeline.interface';
import { environment } from './environment';
import { CONFIG_ENV_KEYS, PipelineConfigDto, PipelineLogLevel } from './pipeline-config.dto';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

/**
 * Validated, frozen configuration. Built once at startup and injected
 * under PIPELINE_CONFIG; nothing reads the environment after that.
 */
export interface PipelineConfig {
  readonly channelId: string;
  readonly timestampCommenters: readonly string[];
  readonly keywords: readonly string[];
  readonly excludeKeywords: readonly string[];
  readonly maxCandidateVideos: number;
  readonly uploadPrivacy: PrivacyStatus;
  readonly videoNamePrefix: string;
  readonly videoTags: readonly string[];
  readonly workDir: string;
  readonly exportDir: string;
  readonly ledgerPath: string;
  readonly duplicateDetection: boolean;
  readonly notFoundTtlHours: number;
  readonly retryAttempts: number;
  readonly retryBackoffMs: number;
  readonly keepDownloads: boolean;
  readonly ffmpegPath?: string;
  readonly ffprobePath?: string;
  readonly ytdlpPath?: string;
  readonly cookiesFile?: string;
  readonly logLevel: PipelineLogLevel;
  readonly logDir: string;
}

export type EnvReader = (key: string) => string | undefined;

const DEFAULTS: Record<string, unknown> = {
  keywords: [],
  excludeKeywords: [],
  videoTags: [],
  maxCandidateVideos: environment.maxCandidateVideos,
  uploadPrivacy: environment.uploadPrivacy,
  videoNamePrefix: environment.videoNamePrefix,
  workDir: environment.workDir,
  exportDir: environment.exportDir,
  ledgerPath: environment.ledgerPath,
  duplicateDetection: environment.duplicateDetection,
  notFoundTtlHours: environment.notFoundTtlHours,
  retryAttempts: environment.retryAttempts,
  retryBackoffMs: environment.retryBackoffMs,
  keepDownloads: environment.keepDownloads,
  logLevel: environment.logLevel,
  logDir: environment.logDir,
};

function envKeyFor(property: string): string {
  const entry = Object.entries(CONFIG_ENV_KEYS).find(([prop]) => prop === property);
  return entry ? entry[1] : property;
}

function describe(errors: ValidationError[]): string[] {
  return errors.map(error => {
    const messages = Object.values(error.constraints ?? {});
    return `${envKeyFor(error.property)}: ${messages.join('; ')}`;
  });
}

/**
 * Read every variable, apply defaults for unset or blank ones, validate, and
 * freeze. Throws ConfigValidationError listing every offending variable.
 */
export function loadPipelineConfig(read: EnvReader): PipelineConfig {
  const raw: Record<string, unknown> = {};
  for (const [property, envKey] of Object.entries(CONFIG_ENV_KEYS)) {
    const value = read(envKey);
    raw[property] = value === undefined || value.trim() === '' ? DEFAULTS[property] : value;
  }

  const dto = plainToInstance(PipelineConfigDto, raw);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new ConfigValidationError(describe(errors));
  }

  return Object.freeze({
    channelId: dto.channelId,
    timestampCommenters: Object.freeze([...dto.timestampCommenters]),
    keywords: Object.freeze([...dto.keywords]),
    excludeKeywords: Object.freeze([...dto.excludeKeywords]),
    maxCandidateVideos: dto.maxCandidateVideos,
    uploadPrivacy: dto.uploadPrivacy,
    videoNamePrefix: dto.videoNamePrefix,
    videoTags: Object.freeze([...dto.videoTags]),
    workDir: dto.workDir,
    exportDir: dto.exportDir,
    ledgerPath: dto.ledgerPath,
    duplicateDetection: dto.duplicateDetection,
    notFoundTtlHours: dto.notFoundTtlHours,
    retryAttempts: dto.retryAttempts,
    retryBackoffMs: dto.retryBackoffMs,
    keepDownloads: dto.keepDownloads,
    ffmpegPath: dto.ffmpegPath,
    ffprobePath: dto.ffprobePath,
    ytdlpPath: dto.ytdlpPath,
    cookiesFile: dto.cookiesFile,
    logLevel: dto.logLevel,
    logDir: dto.logDir,
  });
}
