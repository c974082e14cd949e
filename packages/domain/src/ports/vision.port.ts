import { CaptionEvent } from '../types/entities.js';

/**
 * Vision captioning port
 *
 * Production: Moondream query API
 */
export interface VisionPort {
  /**
   * Create a per-session captioner with its own frame counter
   */
  createCaptioner(sessionId: string): FrameCaptioner;

  isConfigured(): boolean;

  healthCheck(): Promise<boolean>;

  close(): Promise<void>;
}

/**
 * Throttled frame captioner. Every call counts a frame; only every Nth
 * frame is sent to the provider. Never throws: failures yield null.
 */
export interface FrameCaptioner {
  describe(image: Buffer): Promise<CaptionEvent | null>;

  /** Frames seen so far */
  readonly frameCount: number;

  /** Most recent captions, oldest first */
  getHistory(): CaptionEvent[];
}

export const DEFAULT_CAPTION_PROMPT = 'Describe what you see in one short sentence.';

/** Process every Nth frame to stay inside provider rate limits */
export const DEFAULT_PROCESS_EVERY_N = 10;

export const DEFAULT_CAPTION_HISTORY = 50;
