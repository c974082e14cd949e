/**
 * Encoded clip produced by the clip encoder when a window completes
 * or is flushed on disconnect. Consumed exactly once by the upload pipeline.
 */
export interface ClipResult {
  /** Encoded MP4 bytes */
  video: Buffer;

  /** Capture time of the first frame in the window (ISO-8601) */
  start_time: string;

  /** Capture time of the last frame in the window (ISO-8601) */
  end_time: string;

  /** Monotonic per-encoder index, starting at 0 */
  clip_index: number;

  /** JPEG of the middle frame of the window */
  thumbnail: Buffer | null;

  /** Number of frames encoded into this clip */
  frame_count: number;
}

/**
 * Reference to a clip that has been uploaded and recorded.
 * The most recent value per session is shared read-only state (last writer wins).
 */
export interface UploadedClipMetadata {
  s3_key: string;
  s3_bucket: string;
  start_time: string;
  end_time: string;
  thumbnail_s3_key: string | null;
}

/**
 * Caption returned by the vision collaborator for one frame
 */
export interface CaptionEvent {
  /** ISO-8601 time the caption was produced */
  timestamp: string;

  description: string;

  /** Per-session frame counter value of the captioned frame */
  frame_number: number;
}

/**
 * Transcript event emitted by the transcription collaborator
 */
export interface TranscriptEvent {
  /** ISO-8601 time the event was received */
  timestamp: string;

  text: string;

  is_final: boolean;

  /** Diarization label, e.g. "Speaker 0" */
  speaker: string;
}

/**
 * Caption waiting in the annotation batch, tagged with the clip that was
 * most recently uploaded when it was appended
 */
export interface CaptionBatchEntry {
  caption: CaptionEvent;
  clip: UploadedClipMetadata | null;
}

/**
 * One coalesced transcript record persisted per flush
 */
export interface CombinedTranscript {
  /** Timestamp of the first utterance in the batch */
  timestamp: string;

  /** Single distinct speaker, or "multiple" */
  speaker: string;

  /** Utterances joined with single spaces */
  text: string;

  utterance_count: number;
}

/**
 * One coalesced caption record persisted per flush
 */
export interface CombinedCaption {
  /** Timestamp of the first caption in the batch */
  timestamp: string;

  /** Descriptions joined with " | " */
  description: string;

  /** Frame number of the last caption in the batch */
  frame_number: number;

  /** Clip attached to the last caption in the batch */
  clip: UploadedClipMetadata | null;

  caption_count: number;
}

/**
 * Persisted clip row (see db/migrations/001_video_clips.sql)
 */
export interface VideoClip {
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

export type NewVideoClip = Omit<VideoClip, 'id' | 'created_at'>;

/**
 * Record returned by a long-term memory search
 */
export interface MemoryRecord {
  id: string;
  content: string;
  score: number | null;
  metadata: Record<string, unknown>;
  created_at: string | null;
}
