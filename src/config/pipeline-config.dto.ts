// src/config/pipeline-config.dto.ts
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { Transform, TransformFnParams } from 'class-transformer';
import { PrivacyStatus } from '../common/interfaces/pipeline.interface';

export const PRIVACY_STATUSES: readonly PrivacyStatus[] = ['private', 'unlisted', 'public'];
export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug'] as const;
export type PipelineLogLevel = (typeof LOG_LEVELS)[number];

/** "a, b,,c" -> ['a', 'b', 'c'] */
function toList({ value }: TransformFnParams): unknown {
  if (typeof value === 'string') {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
  return value;
}

function toBoolean({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function toNumber({ value }: TransformFnParams): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value.trim());
  }
  return value;
}

function trimmed({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

/**
 * Raw configuration as read from the environment, before freezing.
 * Property names map to variables through CONFIG_ENV_KEYS.
 */
export class PipelineConfigDto {
  @Transform(trimmed)
  @IsString()
  @IsNotEmpty({ message: 'a channel id, playlist id or URL is required' })
  channelId!: string;

  @Transform(toList)
  @IsArray()
  @ArrayNotEmpty({ message: 'at least one allowed comment author is required' })
  @IsString({ each: true })
  timestampCommenters!: string[];

  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  keywords!: string[];

  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  excludeKeywords!: string[];

  @Transform(toNumber)
  @IsInt()
  @Min(1)
  @Max(50)
  maxCandidateVideos!: number;

  @Transform(trimmed)
  @IsIn(PRIVACY_STATUSES)
  uploadPrivacy!: PrivacyStatus;

  @IsString()
  videoNamePrefix!: string;

  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  videoTags!: string[];

  @IsString()
  @IsNotEmpty()
  workDir!: string;

  @IsString()
  @IsNotEmpty()
  exportDir!: string;

  @IsString()
  @IsNotEmpty()
  ledgerPath!: string;

  @Transform(toBoolean)
  @IsBoolean()
  duplicateDetection!: boolean;

  @Transform(toNumber)
  @IsNumber()
  @Min(0)
  notFoundTtlHours!: number;

  @Transform(toNumber)
  @IsInt()
  @Min(0)
  @Max(10)
  retryAttempts!: number;

  @Transform(toNumber)
  @IsInt()
  @Min(0)
  retryBackoffMs!: number;

  @Transform(toBoolean)
  @IsBoolean()
  keepDownloads!: boolean;

  @IsOptional()
  @IsString()
  ffmpegPath?: string;

  @IsOptional()
  @IsString()
  ffprobePath?: string;

  @IsOptional()
  @IsString()
  ytdlpPath?: string;

  // Netscape cookies file handed to yt-dlp, for channels that need a login
  @IsOptional()
  @IsString()
  cookiesFile?: string;

  @Transform(trimmed)
  @IsIn(LOG_LEVELS)
  logLevel!: PipelineLogLevel;

  @IsString()
  @IsNotEmpty()
  logDir!: string;
}

export const CONFIG_ENV_KEYS: Record<keyof PipelineConfigDto, string> = {
  channelId: 'CHANNEL_ID',
  timestampCommenters: 'TIMESTAMP_COMMENTERS',
  keywords: 'KEYWORDS',
  excludeKeywords: 'EXCLUDE_KEYWORDS',
  maxCandidateVideos: 'MAX_CANDIDATE_VIDEOS',
  uploadPrivacy: 'UPLOAD_PRIVACY',
  videoNamePrefix: 'VIDEO_NAME_PREFIX',
  videoTags: 'VIDEO_TAGS',
  workDir: 'WORK_DIR',
  exportDir: 'EXPORT_DIR',
  ledgerPath: 'LEDGER_PATH',
  duplicateDetection: 'DUPLICATE_DETECTION',
  notFoundTtlHours: 'NOT_FOUND_TTL_HOURS',
  retryAttempts: 'RETRY_ATTEMPTS',
  retryBackoffMs: 'RETRY_BACKOFF_MS',
  keepDownloads: 'KEEP_DOWNLOADS',
  ffmpegPath: 'FFMPEG_PATH',
  ffprobePath: 'FFPROBE_PATH',
  ytdlpPath: 'YTDLP_PATH',
  cookiesFile: 'COOKIES_FILE',
  logLevel: 'LOG_LEVEL',
  logDir: 'LOG_DIR',
};
