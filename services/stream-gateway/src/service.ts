/**
 * Gateway Service
 *
 * Owns the registry of live sessions and the read-side queries the HTTP
 * routes expose: clips with presigned URLs and long-term memory search.
 */

import {
  WireConnection,
  VideoClip,
  MemoryRecord,
  ActivityOutcome,
  describeError,
} from '@streamlens/domain';
import { StreamSession, SessionAdapters, SessionSettings, SessionStats } from './session.js';
import { closeAdapters } from './adapters.js';

export interface GatewayOptions extends SessionSettings {
  /** Lifetime of presigned clip and thumbnail URLs (seconds) */
  presignTtlSeconds: number;
}

export interface ClipView {
  id: number;
  session_id: string;
  clip_index: number;
  s3_key: string;
  s3_bucket: string;
  start_time: string;
  end_time: string;
  thumbnail_s3_key: string | null;
  url: string | null;
  thumbnail_url: string | null;
}

export interface GatewayStats {
  active_sessions: number;
  total_sessions: number;
  rejected_connections: number;
  sessions: SessionStats[];
}

export interface HealthReport {
  healthy: boolean;
  checks: {
    storage: boolean;
    database: boolean;
    transcription: boolean;
    vision: boolean;
    memory: boolean;
    ffmpeg: boolean;
  };
}

async function checkHealth(check: () => Promise<boolean>): Promise<boolean> {
  try {
    return await check();
  } catch {
    return false;
  }
}

export class GatewayService {
  private readonly sessions = new Map<string, StreamSession>();
  private readonly running = new Map<string, Promise<void>>();
  private totalSessions = 0;
  private rejectedConnections = 0;
  private closing = false;

  constructor(
    private readonly adapters: SessionAdapters,
    private readonly options: GatewayOptions
  ) {}

  async initialize(): Promise<void> {
    if (this.options.bucket) {
      await this.adapters.storage.ensureBucket(this.options.bucket);
    }
    if (!(await this.adapters.videoEncoder.isAvailable())) {
      console.warn('[Gateway] ffmpeg not available: clips will fail to encode');
    }
    console.log('[Gateway] Service initialized');
  }

  /**
   * Start a session for an accepted connection. Returns null when shutting down.
   */
  handleConnection(wire: WireConnection): StreamSession | null {
    if (this.closing) {
      this.rejectedConnections++;
      wire.close(1001, 'server shutting down');
      return null;
    }

    const session = new StreamSession(wire, this.adapters, {
      bucket: this.options.bucket,
      userScope: this.options.userScope,
      pipeline: this.options.pipeline,
    });
    this.sessions.set(session.id, session);
    this.totalSessions++;
    console.log(`[Gateway] Accepted ${session.id} (${this.sessions.size} active)`);

    const done = session
      .run()
      .then(
        (reports) => {
          const failed = reports.filter((r) => r.outcome === ActivityOutcome.FAILED).length;
          console.log(`[Gateway] ${session.id} finished (${failed} failed activities)`);
        },
        (error: unknown) => {
          console.error(`[Gateway] ${session.id} ended with error:`, describeError(error));
        }
      )
      .finally(() => {
        this.sessions.delete(session.id);
        this.running.delete(session.id);
      });
    this.running.set(session.id, done);

    return session;
  }

  getStats(): GatewayStats {
    return {
      active_sessions: this.sessions.size,
      total_sessions: this.totalSessions,
      rejected_connections: this.rejectedConnections,
      sessions: [...this.sessions.values()].map((session) => session.getStats()),
    };
  }

  /**
   * All clips of a session, or only those overlapping [start, end]
   */
  async getSessionClips(sessionId: string, range?: { start: Date; end: Date }): Promise<ClipView[]> {
    const rows = range
      ? await this.adapters.clips.getClipsInRange(sessionId, range.start, range.end)
      : await this.adapters.clips.getSessionClips(sessionId);
    return Promise.all(rows.map((row) => this.toClipView(row)));
  }

  async getClipAtTime(sessionId: string, time: Date): Promise<ClipView | null> {
    const row = await this.adapters.clips.getClipAtTime(sessionId, time);
    return row ? this.toClipView(row) : null;
  }

  async searchMemories(query: string, limit: number): Promise<MemoryRecord[]> {
    const results = await this.adapters.memory.search(query, this.options.userScope, limit);
    console.log(`[Gateway] Memory search for "${query}" returned ${results.length} results`);
    return results;
  }

  async healthCheck(): Promise<HealthReport> {
    const [storage, database, transcription, vision, memory, ffmpeg] = await Promise.all([
      checkHealth(() => this.adapters.storage.healthCheck()),
      checkHealth(() => this.adapters.clips.healthCheck()),
      checkHealth(() => this.adapters.transcription.healthCheck()),
      checkHealth(() => this.adapters.vision.healthCheck()),
      checkHealth(() => this.adapters.memory.healthCheck()),
      checkHealth(() => this.adapters.videoEncoder.isAvailable()),
    ]);

    // collaborators degrade individual lanes; only the stores are required
    return {
      healthy: storage && database,
      checks: { storage, database, transcription, vision, memory, ffmpeg },
    };
  }

  /**
   * Stop accepting connections, wind down every live session, close adapters
   */
  async close(): Promise<void> {
    this.closing = true;
    console.log(`[Gateway] Closing ${this.sessions.size} live sessions`);

    for (const session of this.sessions.values()) {
      session.stop('server shutdown');
    }
    await Promise.all(this.running.values());

    await closeAdapters(this.adapters);
    console.log('[Gateway] Service closed');
  }

  private async toClipView(row: VideoClip): Promise<ClipView> {
    const ttl = this.options.presignTtlSeconds;
    const [url, thumbnailUrl] = await Promise.all([
      this.presign(row.s3_bucket, row.s3_key, ttl),
      row.thumbnail_s3_key ? this.presign(row.s3_bucket, row.thumbnail_s3_key, ttl) : null,
    ]);

    return {
      id: row.id,
      session_id: row.session_id,
      clip_index: row.clip_index,
      s3_key: row.s3_key,
      s3_bucket: row.s3_bucket,
      start_time: row.start_time.toISOString(),
      end_time: row.end_time.toISOString(),
      thumbnail_s3_key: row.thumbnail_s3_key,
      url,
      thumbnail_url: thumbnailUrl,
    };
  }

  private async presign(bucket: string, key: string, ttl: number): Promise<string | null> {
    try {
      return await this.adapters.storage.getPresignedUrl(bucket, key, ttl);
    } catch (error: unknown) {
      console.error(`[Gateway] Failed to presign ${key}:`, describeError(error));
      return null;
    }
  }
}
