import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadConfig } from '@streamlens/domain';
import { Adapters, initializeAdapters } from './adapters.js';
import {
  FakeStorage,
  FakeClipRepository,
  FakeTranscription,
  FakeVision,
  FakeMemory,
  FakeVideoEncoder,
} from './testing/fakes.js';

class MigratingClipRepository extends FakeClipRepository {
  failure: Error | null = null;
  initialized = false;

  async initialize(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.initialized = true;
  }
}

describe('initializeAdapters', () => {
  let clips: MigratingClipRepository;
  let adapters: Adapters;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    clips = new MigratingClipRepository();
    adapters = {
      storage: new FakeStorage(),
      clips,
      transcription: new FakeTranscription(),
      vision: new FakeVision(),
      memory: new FakeMemory(),
      videoEncoder: new FakeVideoEncoder(),
    };
  });

  it('should initialize the clip repository', async () => {
    await initializeAdapters(adapters, loadConfig({}));

    expect(clips.initialized).toBe(true);
  });

  it('should warn and continue in local mode when the database is down', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    clips.failure = new Error('connect ECONNREFUSED 127.0.0.1:5432');

    await initializeAdapters(adapters, loadConfig({}));

    expect(warn).toHaveBeenCalledWith(
      '[Adapters] Database unavailable, continuing in local mode:',
      'connect ECONNREFUSED 127.0.0.1:5432'
    );
  });

  it('should fail startup in production when the database is down', async () => {
    clips.failure = new Error('connect ECONNREFUSED 127.0.0.1:5432');
    const config = loadConfig({ ENVIRONMENT: 'production', POSTGRES_PASSWORD: 'test-secret' });

    await expect(initializeAdapters(adapters, config)).rejects.toThrow(
      'connect ECONNREFUSED 127.0.0.1:5432'
    );
  });
});
