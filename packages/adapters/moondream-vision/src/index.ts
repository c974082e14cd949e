/**
 * Moondream Vision Adapter
 *
 * Implements the VisionPort interface over the Moondream query API.
 * Each session gets its own captioner so frame counters and caption
 * history never leak between connections.
 */

import { z } from 'zod';
import {
  VisionPort,
  FrameCaptioner,
  VisionConfig,
  CaptionEvent,
  DEFAULT_CAPTION_PROMPT,
  DEFAULT_PROCESS_EVERY_N,
  DEFAULT_CAPTION_HISTORY,
  describeError,
} from '@streamlens/domain';

export interface MoondreamConfig {
  /** API key; captioning is disabled without it */
  apiKey?: string;

  /** API base URL */
  endpoint?: string;

  /** Question asked about every processed frame */
  prompt?: string;

  /** Caption every Nth frame */
  processEveryN?: number;

  /** Captions kept per session */
  historySize?: number;

  requestTimeoutMs?: number;
}

const queryResponseSchema = z.object({
  answer: z.string(),
});

type ResolvedMoondreamConfig = Required<Omit<MoondreamConfig, 'apiKey'>> & { apiKey?: string };

// ==================== Captioner ====================

export class MoondreamCaptioner implements FrameCaptioner {
  private frames = 0;
  private history: CaptionEvent[] = [];

  constructor(
    private readonly sessionId: string,
    private readonly config: ResolvedMoondreamConfig
  ) {}

  get frameCount(): number {
    return this.frames;
  }

  getHistory(): CaptionEvent[] {
    return [...this.history];
  }

  async describe(image: Buffer): Promise<CaptionEvent | null> {
    this.frames++;
    const frameNumber = this.frames;

    if (frameNumber % this.config.processEveryN !== 0) {
      return null;
    }

    if (!this.config.apiKey) {
      return null;
    }

    try {
      const description = await this.query(image);
      if (!description) {
        console.warn(`[Moondream] Empty answer for frame ${frameNumber} (${this.sessionId})`);
        return null;
      }

      const caption: CaptionEvent = {
        timestamp: new Date().toISOString(),
        description,
        frame_number: frameNumber,
      };
      this.remember(caption);
      return caption;
    } catch (error: unknown) {
      console.error(
        `[Moondream] Caption failed for frame ${frameNumber} (${this.sessionId}):`,
        describeError(error)
      );
      return null;
    }
  }

  private async query(image: Buffer): Promise<string> {
    const response = await fetch(`${this.config.endpoint}/query`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Moondream-Auth': this.config.apiKey ?? '',
      },
      body: JSON.stringify({
        image_url: `data:image/jpeg;base64,${image.toString('base64')}`,
        question: this.config.prompt,
        stream: false,
      }),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Moondream API error: ${response.status} ${response.statusText}`);
    }

    const body = queryResponseSchema.parse(await response.json());
    return body.answer.trim();
  }

  private remember(caption: CaptionEvent): void {
    this.history.push(caption);
    if (this.history.length > this.config.historySize) {
      this.history.splice(0, this.history.length - this.config.historySize);
    }
  }
}

// ==================== Adapter ====================

/**
 * Moondream adapter for frame captioning
 */
export class MoondreamVisionAdapter implements VisionPort {
  private readonly config: ResolvedMoondreamConfig;
  private warnedUnconfigured = false;

  constructor(config: MoondreamConfig) {
    this.config = {
      apiKey: config.apiKey,
      endpoint: config.endpoint ?? 'https://api.moondream.ai/v1',
      prompt: config.prompt ?? DEFAULT_CAPTION_PROMPT,
      processEveryN: Math.max(1, config.processEveryN ?? DEFAULT_PROCESS_EVERY_N),
      historySize: config.historySize ?? DEFAULT_CAPTION_HISTORY,
      requestTimeoutMs: config.requestTimeoutMs ?? 30000,
    };
  }

  createCaptioner(sessionId: string): FrameCaptioner {
    if (!this.config.apiKey && !this.warnedUnconfigured) {
      this.warnedUnconfigured = true;
      console.warn('[Moondream] MOONDREAM_API_KEY not set; captions disabled');
    }
    return new MoondreamCaptioner(sessionId, this.config);
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  async healthCheck(): Promise<boolean> {
    return this.isConfigured();
  }

  async close(): Promise<void> {
    // Stateless HTTP client
  }
}

/**
 * Create Moondream adapter from the vision section of the configuration
 */
export function createMoondreamVisionAdapter(config: VisionConfig): MoondreamVisionAdapter {
  return new MoondreamVisionAdapter({
    apiKey: config.apiKey,
    endpoint: config.endpoint,
    prompt: config.prompt,
    processEveryN: config.processEveryN,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}
