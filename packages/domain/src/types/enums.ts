/**
 * Kind tag carried by every inbound wire message once it has been classified
 */
export enum InboundKind {
  IMAGE_FRAME = 'image_frame',
  AUDIO_CHUNK = 'audio_chunk',
  AUDIO_STREAM_STOP = 'audio_stream_stop',
  OTHER = 'other',
}

/**
 * Outbound message types sent back to the client
 */
export enum OutboundType {
  TRANSCRIPT = 'transcript',
  CAPTION = 'moondream_caption',
}

/**
 * Memory record types written by the annotation batcher
 */
export enum MemoryRecordType {
  TRANSCRIPT = 'transcript',
  CAPTION = 'moondream_caption',
}

/**
 * Why an annotation flush ran
 */
export enum FlushReason {
  INTERVAL = 'interval',
  TEARDOWN = 'teardown',
}

/**
 * How a session activity ended
 */
export enum ActivityOutcome {
  COMPLETED = 'completed',
  DISCONNECTED = 'disconnected',
  CANCELLED = 'cancelled',
  FAILED = 'failed',
}
