/**
 * Configuration for StreamLens
 *
 * Everything is read from environment variables. Collaborators whose
 * credentials are missing stay disabled; the pipeline degrades instead
 * of refusing to start.
 */

export type Environment = 'local' | 'production';

export interface Config {
  /** Deployment environment */
  environment: Environment;

  /** HTTP/WebSocket server configuration */
  server: ServerConfig;

  /** Blob storage configuration */
  storage: StorageConfig;

  /** Relational storage configuration */
  database: DatabaseConfig;

  /** Live transcription configuration */
  transcription: TranscriptionConfig;

  /** Vision captioning configuration */
  vision: VisionConfig;

  /** Long-term memory configuration */
  memory: MemoryConfig;

  /** Clip and annotation pipeline tuning */
  pipeline: PipelineConfig;
}

export interface ServerConfig {
  host: string;
  port: number;

  /** WebSocket path for the video caption stream */
  wsPath: string;
}

export interface StorageConfig {
  /** Custom S3 endpoint (MinIO); AWS when unset */
  endpoint?: string;

  region: string;

  accessKeyId?: string;
  secretAccessKey?: string;

  /** Use path-style URLs (required for MinIO) */
  forcePathStyle: boolean;

  /** Clip bucket. null disables clip persistence. */
  bucket: string | null;

  /** Presigned URL lifetime in seconds */
  presignTtlSeconds: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;

  /** Pool size */
  maxConnections: number;
}

export interface TranscriptionConfig {
  /** Deepgram API key. Transcription is disabled when unset. */
  apiKey?: string;

  endpoint: string;
  model: string;
  language: string;

  /** Sample rate of the client's linear16 audio */
  sampleRate: number;

  /** Connect timeout in ms */
  connectTimeoutMs: number;
}

export interface VisionConfig {
  /** Moondream API key. Captioning is disabled when unset. */
  apiKey?: string;

  endpoint: string;
  prompt: string;

  /** Caption every Nth frame */
  processEveryN: number;

  /** Per-request timeout in ms */
  requestTimeoutMs: number;
}

export interface MemoryConfig {
  /** Mem0 API key. Memory persistence is disabled when unset. */
  apiKey?: string;

  endpoint: string;

  /** Memory owner all annotations are filed under */
  userScope: string;
}

export interface PipelineConfig {
  /** Clip window length in seconds */
  clipDurationSec: number;

  /** Playback frame rate of encoded clips */
  clipFps: number;

  /** Thumbnail JPEG quality (1-100) */
  thumbnailQuality: number;

  /** Annotation flush interval in ms */
  batchIntervalMs: number;

  /** How long sentinel-draining activities get before forced cancellation (ms) */
  drainTimeoutMs: number;

  /** ffmpeg binary */
  ffmpegPath: string;
}

/**
 * Load configuration from environment variables.
 * Throws in production when POSTGRES_PASSWORD is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const environment: Environment = env.ENVIRONMENT === 'production' ? 'production' : 'local';

  return {
    environment,

    server: {
      host: env.HOST || '0.0.0.0',
      port: parseInt(env.PORT || '8000', 10),
      wsPath: env.WS_PATH || '/ws/video-caption',
    },

    storage: {
      endpoint: env.S3_ENDPOINT || undefined,
      region: env.AWS_REGION || 'us-east-1',
      accessKeyId: env.AWS_ACCESS_KEY_ID || undefined,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || undefined,
      forcePathStyle: env.S3_FORCE_PATH_STYLE === 'true',
      bucket: env.S3_BUCKET_NAME || null,
      presignTtlSeconds: parseInt(env.S3_PRESIGN_TTL_SECONDS || '3600', 10),
    },

    database: {
      host: env.POSTGRES_HOST || 'localhost',
      port: parseInt(env.POSTGRES_PORT || '5432', 10),
      database: env.POSTGRES_DB || 'streamlens',
      user: env.POSTGRES_USER || 'streamlens',
      // the development default never reaches production
      password:
        environment === 'production'
          ? requireEnv('POSTGRES_PASSWORD', env)
          : env.POSTGRES_PASSWORD || 'streamlens',
      maxConnections: parseInt(env.POSTGRES_MAX_CONNECTIONS || '10', 10),
    },

    transcription: {
      apiKey: env.DEEPGRAM_API_KEY || undefined,
      endpoint: env.DEEPGRAM_WS_URL || 'wss://api.deepgram.com/v1/listen',
      model: env.DEEPGRAM_MODEL || 'nova-3',
      language: env.DEEPGRAM_LANGUAGE || 'en-US',
      sampleRate: parseInt(env.AUDIO_SAMPLE_RATE || '24000', 10),
      connectTimeoutMs: parseInt(env.DEEPGRAM_CONNECT_TIMEOUT_MS || '10000', 10),
    },

    vision: {
      apiKey: env.MOONDREAM_API_KEY || undefined,
      endpoint: env.MOONDREAM_ENDPOINT || 'https://api.moondream.ai/v1',
      prompt: env.MOONDREAM_PROMPT || 'Describe what you see in one short sentence.',
      processEveryN: parseInt(env.MOONDREAM_EVERY_N || '10', 10),
      requestTimeoutMs: parseInt(env.MOONDREAM_TIMEOUT_MS || '30000', 10),
    },

    memory: {
      apiKey: env.MEM0_API_KEY || undefined,
      endpoint: env.MEM0_ENDPOINT || 'https://api.mem0.ai',
      userScope: env.MEM0_USER_ID || 'streamlens',
    },

    pipeline: {
      clipDurationSec: parseFloat(env.CLIP_DURATION_SEC || '10'),
      clipFps: parseInt(env.CLIP_FPS || '24', 10),
      thumbnailQuality: parseInt(env.THUMBNAIL_QUALITY || '80', 10),
      batchIntervalMs: parseInt(env.ANNOTATION_BATCH_INTERVAL_MS || '30000', 10),
      drainTimeoutMs: parseInt(env.DRAIN_TIMEOUT_MS || '15000', 10),
      ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
    },
  };
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}

/**
 * Mask a secret for logging (first and last 4 characters)
 */
export function maskSecret(value: string | undefined): string {
  if (!value) return '<not set>';
  return value.length > 8 ? `${value.slice(0, 4)}...${value.slice(-4)}` : '****';
}
