import { TranscriptEvent } from '../types/entities.js';
import { LaneQueue } from '../queue/lane-queue.js';

/**
 * Live transcription port
 *
 * Production: Deepgram live streaming adapter
 *
 * The adapter writes every recognised utterance into the sink channel it is
 * given, in emission order. The sink belongs to the caller: the adapter
 * never closes it.
 */
export interface TranscriptionPort {
  /**
   * Open a live transcription session
   * @param sessionId Owning session, for logging
   * @param sink Channel the adapter writes transcript events into
   */
  startSession(sessionId: string, sink: LaneQueue<TranscriptEvent>): Promise<TranscriptionSession>;

  /**
   * Whether credentials are configured
   */
  isConfigured(): boolean;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close all open sessions
   */
  close(): Promise<void>;
}

export interface TranscriptionSession {
  /** False once finished or once the provider connection dropped */
  readonly isActive: boolean;

  /**
   * Forward raw linear16 PCM
   */
  send(audio: Buffer): Promise<void>;

  /**
   * End the stream and close the provider connection. Idempotent.
   */
  finish(): Promise<void>;
}

export interface TranscriptionOptions {
  /** Provider model name */
  model: string;

  language: string;

  /** Input sample rate in Hz */
  sampleRate: number;

  channels: number;

  encoding: string;

  diarize: boolean;

  interimResults: boolean;

  smartFormat: boolean;
}

/**
 * Ray-Ban/Android clients stream 24 kHz mono linear16
 */
export const DEFAULT_TRANSCRIPTION_OPTIONS: TranscriptionOptions = {
  model: 'nova-3',
  language: 'en-US',
  sampleRate: 24000,
  channels: 1,
  encoding: 'linear16',
  diarize: true,
  interimResults: true,
  smartFormat: true,
};

export const DEFAULT_SPEAKER = 'Speaker 0';

export function speakerLabel(index: number | undefined): string {
  return index === undefined ? DEFAULT_SPEAKER : `Speaker ${index}`;
}
