/**
 * Adapter factory for the stream gateway
 */

import { Config, ClipRepositoryPort, maskSecret, describeError } from '@streamlens/domain';
import { createS3StorageAdapter } from '@streamlens/s3-storage';
import { createPostgresClipRepository } from '@streamlens/postgres';
import { createDeepgramTranscriptionAdapter } from '@streamlens/deepgram-stt';
import { createMoondreamVisionAdapter } from '@streamlens/moondream-vision';
import { createMem0MemoryAdapter } from '@streamlens/mem0-memory';
import { createFfmpegVideoEncoder } from '@streamlens/ffmpeg-encoder';
import { SessionAdapters } from './session.js';

export interface Adapters extends SessionAdapters {
  clips: ClipRepositoryPort & { initialize(): Promise<void> };
}

export function createAdapters(config: Config): Adapters {
  console.log(`[Adapters] Creating adapters (environment=${config.environment})`);

  return {
    storage: createS3StorageAdapter(config.storage),
    clips: createPostgresClipRepository(config.database),
    transcription: createDeepgramTranscriptionAdapter(config.transcription),
    vision: createMoondreamVisionAdapter(config.vision),
    memory: createMem0MemoryAdapter(config.memory),
    videoEncoder: createFfmpegVideoEncoder(config.pipeline.ffmpegPath),
  };
}

/**
 * Verify the database connection and report which collaborators are enabled.
 * Missing collaborator credentials are logged, never fatal. An unreachable
 * database is fatal in production and a warning in local mode.
 */
export async function initializeAdapters(adapters: Adapters, config: Config): Promise<void> {
  console.log(`[Adapters] Deepgram key: ${maskSecret(config.transcription.apiKey)}`);
  console.log(`[Adapters] Moondream key: ${maskSecret(config.vision.apiKey)}`);
  console.log(`[Adapters] Mem0 key: ${maskSecret(config.memory.apiKey)}`);
  console.log(`[Adapters] Clip bucket: ${config.storage.bucket ?? '<not set>'}`);

  if (!adapters.transcription.isConfigured()) {
    console.warn('[Adapters] Transcription disabled: audio will be dropped');
  }
  if (!adapters.vision.isConfigured()) {
    console.warn('[Adapters] Captioning disabled: frames are clipped but not described');
  }
  if (!adapters.memory.isConfigured()) {
    console.warn('[Adapters] Long-term memory disabled: annotations are not persisted');
  }

  try {
    await adapters.clips.initialize();
  } catch (error: unknown) {
    if (config.environment !== 'local') {
      throw error;
    }
    console.warn(
      '[Adapters] Database unavailable, continuing in local mode:',
      describeError(error)
    );
  }
}

export async function closeAdapters(adapters: SessionAdapters): Promise<void> {
  await Promise.all([
    adapters.transcription.close(),
    adapters.vision.close(),
    adapters.memory.close(),
    adapters.storage.close(),
    adapters.clips.close(),
  ]);
}
