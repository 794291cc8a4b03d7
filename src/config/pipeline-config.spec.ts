import { ConfigValidationError } from '../common/errors';
import { loadPipelineConfig } from './pipeline-config';

function reader(values: Record<string, string>) {
  return (key: string): string | undefined => values[key];
}

const required = {
  CHANNEL_ID: 'UC_test_channel',
  TIMESTAMP_COMMENTERS: 'alice, bob',
};

describe('loadPipelineConfig', () => {
  it('applies defaults for unset variables', () => {
    const config = loadPipelineConfig(reader(required));

    expect(config.channelId).toBe('UC_test_channel');
    expect(config.timestampCommenters).toEqual(['alice', 'bob']);
    expect(config.keywords).toEqual([]);
    expect(config.excludeKeywords).toEqual([]);
    expect(config.maxCandidateVideos).toBe(10);
    expect(config.uploadPrivacy).toBe('private');
    expect(config.videoNamePrefix).toBe('[Compilation]');
    expect(config.workDir).toBe('downloads');
    expect(config.exportDir).toBe('exports');
    expect(config.ledgerPath).toBe('data/processed_videos.db');
    expect(config.duplicateDetection).toBe(false);
    expect(config.notFoundTtlHours).toBe(24);
    expect(config.retryAttempts).toBe(3);
    expect(config.retryBackoffMs).toBe(1000);
    expect(config.keepDownloads).toBe(false);
    expect(config.ffmpegPath).toBeUndefined();
    expect(config.cookiesFile).toBeUndefined();
    expect(config.logLevel).toBe('info');
    expect(config.logDir).toBe('logs');
  });

  it('parses lists, numbers and booleans', () => {
    const config = loadPipelineConfig(reader({
      ...required,
      KEYWORDS: 'Tingles, whisper,,',
      EXCLUDE_KEYWORDS: 'ad',
      VIDEO_TAGS: 'asmr,compilation',
      MAX_CANDIDATE_VIDEOS: '25',
      UPLOAD_PRIVACY: 'unlisted',
      DUPLICATE_DETECTION: 'yes',
      KEEP_DOWNLOADS: '1',
      NOT_FOUND_TTL_HOURS: '0.5',
      FFMPEG_PATH: '/opt/ffmpeg',
      COOKIES_FILE: 'secrets/cookies.txt',
    }));

    expect(config.keywords).toEqual(['Tingles', 'whisper']);
    expect(config.excludeKeywords).toEqual(['ad']);
    expect(config.videoTags).toEqual(['asmr', 'compilation']);
    expect(config.maxCandidateVideos).toBe(25);
    expect(config.uploadPrivacy).toBe('unlisted');
    expect(config.duplicateDetection).toBe(true);
    expect(config.keepDownloads).toBe(true);
    expect(config.notFoundTtlHours).toBe(0.5);
    expect(config.ffmpegPath).toBe('/opt/ffmpeg');
    expect(config.cookiesFile).toBe('secrets/cookies.txt');
  });

  it('treats blank values as unset', () => {
    const config = loadPipelineConfig(reader({ ...required, MAX_CANDIDATE_VIDEOS: '  ', VIDEO_NAME_PREFIX: '' }));

    expect(config.maxCandidateVideos).toBe(10);
    expect(config.videoNamePrefix).toBe('[Compilation]');
  });

  it('returns a frozen structure', () => {
    const config = loadPipelineConfig(reader(required));

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timestampCommenters)).toBe(true);
  });

  it('reports every invalid variable at once', () => {
    let caught: unknown;
    try {
      loadPipelineConfig(reader({
        MAX_CANDIDATE_VIDEOS: '51',
        UPLOAD_PRIVACY: 'secret',
        DUPLICATE_DETECTION: 'maybe',
      }));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;

    const variables = caught.problems.map(problem => problem.split(':')[0]).sort();
    expect(variables).toEqual([
      'CHANNEL_ID',
      'DUPLICATE_DETECTION',
      'MAX_CANDIDATE_VIDEOS',
      'TIMESTAMP_COMMENTERS',
      'UPLOAD_PRIVACY',
    ]);
    expect(caught.message.startsWith('Configuration error!\n  - ')).toBe(true);
  });

  it('rejects a non-numeric count', () => {
    expect(() => loadPipelineConfig(reader({ ...required, RETRY_ATTEMPTS: 'three' }))).toThrow(ConfigValidationError);
  });
});
