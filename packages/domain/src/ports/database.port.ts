import { NewVideoClip, VideoClip } from '../types/entities.js';

/**
 * Clip repository port
 *
 * Production/local: PostgreSQL adapter (db/migrations/001_video_clips.sql)
 *
 * One row per uploaded clip, indexed by (session_id, start_time, end_time)
 * for time-range lookups.
 */
export interface ClipRepositoryPort {
  /**
   * Insert a clip record and return it with its generated id
   */
  insertClip(clip: NewVideoClip): Promise<VideoClip>;

  /**
   * Clip whose time range contains the given instant
   */
  getClipAtTime(sessionId: string, time: Date): Promise<VideoClip | null>;

  /**
   * Clips overlapping [rangeStart, rangeEnd], ordered by start_time
   */
  getClipsInRange(sessionId: string, rangeStart: Date, rangeEnd: Date): Promise<VideoClip[]>;

  /**
   * All clips of a session, ordered by start_time
   */
  getSessionClips(sessionId: string): Promise<VideoClip[]>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}
