import { describe, it, expect } from 'vitest';
import { loadConfig, maskSecret, requireEnv } from './config.js';

describe('loadConfig', () => {
  it('should apply pipeline defaults', () => {
    const config = loadConfig({});

    expect(config.environment).toBe('local');
    expect(config.server.port).toBe(8000);
    expect(config.server.wsPath).toBe('/ws/video-caption');
    expect(config.pipeline).toEqual({
      clipDurationSec: 10,
      clipFps: 24,
      thumbnailQuality: 80,
      batchIntervalMs: 30000,
      drainTimeoutMs: 15000,
      ffmpegPath: 'ffmpeg',
    });
    expect(config.vision.processEveryN).toBe(10);
    expect(config.transcription.sampleRate).toBe(24000);
  });

  it('should leave the bucket null when S3_BUCKET_NAME is unset', () => {
    expect(loadConfig({}).storage.bucket).toBeNull();
    expect(loadConfig({ S3_BUCKET_NAME: 'clips' }).storage.bucket).toBe('clips');
  });

  it('should leave collaborator keys undefined when empty', () => {
    const config = loadConfig({ DEEPGRAM_API_KEY: '', MEM0_API_KEY: 'test-key' });

    expect(config.transcription.apiKey).toBeUndefined();
    expect(config.memory.apiKey).toBe('test-key');
  });

  it('should parse numeric overrides', () => {
    const config = loadConfig({
      CLIP_DURATION_SEC: '2.5',
      ANNOTATION_BATCH_INTERVAL_MS: '1000',
      ENVIRONMENT: 'production',
      POSTGRES_PASSWORD: 'test-secret',
    });

    expect(config.pipeline.clipDurationSec).toBe(2.5);
    expect(config.pipeline.batchIntervalMs).toBe(1000);
    expect(config.environment).toBe('production');
  });
});

describe('requireEnv', () => {
  it('should throw for a missing variable', () => {
    expect(() => requireEnv('S3_BUCKET_NAME', {})).toThrow(
      'Required environment variable S3_BUCKET_NAME is not set'
    );
  });

  it('should require a database password in production only', () => {
    expect(() => loadConfig({ ENVIRONMENT: 'production' })).toThrow(
      'Required environment variable POSTGRES_PASSWORD is not set'
    );
    expect(loadConfig({}).database.password).toBe('streamlens');
    expect(
      loadConfig({ ENVIRONMENT: 'production', POSTGRES_PASSWORD: 'test-secret' }).database.password
    ).toBe('test-secret');
  });
});

describe('maskSecret', () => {
  it('should keep only the edges of long secrets', () => {
    expect(maskSecret('test-secret-value')).toBe('test...alue');
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret(undefined)).toBe('<not set>');
  });
});
