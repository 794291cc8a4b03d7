import { loadPipelineConfig, PipelineConfig } from '../config/pipeline-config';

export function testConfig(env: Record<string, string> = {}): PipelineConfig {
  const values: Record<string, string> = {
    CHANNEL_ID: 'UC_test_channel',
    TIMESTAMP_COMMENTERS: 'alice',
    RETRY_BACKOFF_MS: '0',
    ...env,
  };
  return loadPipelineConfig(key => values[key]);
}
