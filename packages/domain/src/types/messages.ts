import { InboundKind, OutboundType } from './enums.js';

/**
 * Classified inbound message. Immutable once enqueued; each message is moved
 * into exactly one lane queue.
 */
export type InboundMessage =
  | ImageFrameMessage
  | AudioChunkMessage
  | AudioStreamStopMessage
  | OtherMessage;

export interface ImageFrameMessage {
  readonly kind: InboundKind.IMAGE_FRAME;

  /** Base64 JPEG, optionally prefixed with a data URL header */
  readonly image: string;

  /** Processor selector sent by the alternate client format */
  readonly processor: number | null;

  readonly declared_type: string | null;
}

export interface AudioChunkMessage {
  readonly kind: InboundKind.AUDIO_CHUNK;

  /** Base64 linear16 PCM */
  readonly audio: string;

  readonly declared_type: string | null;
}

export interface AudioStreamStopMessage {
  readonly kind: InboundKind.AUDIO_STREAM_STOP;
}

/**
 * Audio-typed message without a payload
 */
export interface OtherMessage {
  readonly kind: InboundKind.OTHER;
  readonly declared_type: string | null;
}

export interface TranscriptOutbound {
  type: OutboundType.TRANSCRIPT;
  text: string;
  is_final: boolean;
  speaker: string;
}

export interface CaptionOutbound {
  type: OutboundType.CAPTION;
  timestamp: string;
  description: string;
  frame_number: number;
  clip_key?: string;
}

export type OutboundMessage = TranscriptOutbound | CaptionOutbound;
