import pg from 'pg';
import {
  ClipRepositoryPort,
  DatabaseConfig,
  NewVideoClip,
  VideoClip,
} from '@streamlens/domain';

const { Pool } = pg;

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  maxConnections?: number;
}

interface VideoClipRow {
  id: number;
  session_id: string;
  clip_index: number;
  s3_key: string;
  s3_bucket: string;
  start_time: Date;
  end_time: Date;
  thumbnail_s3_key: string | null;
  created_at: Date;
}

const CLIP_COLUMNS =
  'id, session_id, clip_index, s3_key, s3_bucket, start_time, end_time, thumbnail_s3_key, created_at';

/**
 * PostgreSQL clip repository
 *
 * Stores one row per uploaded clip for time-range retrieval.
 * Schema: db/migrations/001_video_clips.sql
 */
export class PostgresClipRepository implements ClipRepositoryPort {
  private pool: pg.Pool;

  constructor(config: PostgresConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (error) => {
      console.error('[Postgres] Idle client error:', error);
    });
  }

  /**
   * Warm up one connection so misconfiguration shows at startup
   */
  async initialize(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
      console.log('[Postgres] Connection verified');
    } finally {
      client.release();
    }
  }

  // ==================== Video Clips ====================

  async insertClip(clip: NewVideoClip): Promise<VideoClip> {
    const result = await this.pool.query<VideoClipRow>(
      `INSERT INTO video_clips (
        session_id, clip_index, s3_key, s3_bucket, start_time, end_time, thumbnail_s3_key
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${CLIP_COLUMNS}`,
      [
        clip.session_id,
        clip.clip_index,
        clip.s3_key,
        clip.s3_bucket,
        clip.start_time,
        clip.end_time,
        clip.thumbnail_s3_key,
      ]
    );
    return this.mapClip(result.rows[0]);
  }

  async getClipAtTime(sessionId: string, time: Date): Promise<VideoClip | null> {
    const result = await this.pool.query<VideoClipRow>(
      `SELECT ${CLIP_COLUMNS} FROM video_clips
       WHERE session_id = $1 AND start_time <= $2 AND end_time >= $2
       ORDER BY start_time
       LIMIT 1`,
      [sessionId, time]
    );
    return result.rows[0] ? this.mapClip(result.rows[0]) : null;
  }

  async getClipsInRange(
    sessionId: string,
    rangeStart: Date,
    rangeEnd: Date
  ): Promise<VideoClip[]> {
    const result = await this.pool.query<VideoClipRow>(
      `SELECT ${CLIP_COLUMNS} FROM video_clips
       WHERE session_id = $1 AND start_time <= $3 AND end_time >= $2
       ORDER BY start_time`,
      [sessionId, rangeStart, rangeEnd]
    );
    return result.rows.map((row) => this.mapClip(row));
  }

  async getSessionClips(sessionId: string): Promise<VideoClip[]> {
    const result = await this.pool.query<VideoClipRow>(
      `SELECT ${CLIP_COLUMNS} FROM video_clips
       WHERE session_id = $1
       ORDER BY start_time`,
      [sessionId]
    );
    return result.rows.map((row) => this.mapClip(row));
  }

  // ==================== Health & Cleanup ====================

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    console.log('[Postgres] Pool closed');
  }

  // ==================== Mappers ====================

  private mapClip(row: VideoClipRow): VideoClip {
    return {
      id: row.id,
      session_id: row.session_id,
      clip_index: row.clip_index,
      s3_key: row.s3_key,
      s3_bucket: row.s3_bucket,
      start_time: new Date(row.start_time),
      end_time: new Date(row.end_time),
      thumbnail_s3_key: row.thumbnail_s3_key,
      created_at: new Date(row.created_at),
    };
  }
}

/**
 * Create clip repository from the database section of the configuration
 */
export function createPostgresClipRepository(config: DatabaseConfig): PostgresClipRepository {
  return new PostgresClipRepository({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    maxConnections: config.maxConnections,
  });
}

export { migrate } from './migrate.js';
export type { MigrateConfig } from './migrate.js';
