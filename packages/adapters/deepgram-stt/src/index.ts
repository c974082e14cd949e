/**
 * Deepgram Live Transcription Adapter
 *
 * Implements the TranscriptionPort interface over Deepgram's streaming
 * WebSocket API. One socket per session; recognised utterances (interim and
 * final) are written into the caller's sink channel.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import {
  TranscriptionPort,
  TranscriptionSession,
  TranscriptionOptions,
  TranscriptionConfig,
  TranscriptEvent,
  LaneQueue,
  DEFAULT_TRANSCRIPTION_OPTIONS,
  speakerLabel,
} from '@streamlens/domain';

export interface DeepgramConfig {
  /** API key; sessions cannot start without it */
  apiKey?: string;

  /** Streaming endpoint */
  endpoint?: string;

  /** How long to wait for the socket to open */
  connectTimeoutMs?: number;

  options?: Partial<TranscriptionOptions>;
}

const CLOSE_GRACE_MS = 2000;

// ==================== Wire Format ====================

const resultsSchema = z.object({
  type: z.literal('Results'),
  is_final: z.boolean().optional(),
  channel: z.object({
    alternatives: z
      .array(
        z.object({
          transcript: z.string(),
          confidence: z.number().optional(),
          words: z
            .array(
              z.object({
                word: z.string().optional(),
                speaker: z.number().optional(),
              })
            )
            .optional(),
        })
      )
      .default([]),
  }),
});

/**
 * Turn one provider message into a transcript event.
 * Returns null for metadata, keepalives, empty transcripts and anything
 * that is not a Results payload.
 */
export function parseDeepgramMessage(raw: string, now: Date = new Date()): TranscriptEvent | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = resultsSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const alternative = parsed.data.channel.alternatives[0];
  const text = alternative?.transcript.trim() ?? '';
  if (!alternative || !text) {
    return null;
  }

  return {
    timestamp: now.toISOString(),
    text,
    is_final: parsed.data.is_final ?? false,
    speaker: speakerLabel(alternative.words?.[0]?.speaker),
  };
}

export function buildListenUrl(endpoint: string, options: TranscriptionOptions): string {
  const params = new URLSearchParams({
    model: options.model,
    language: options.language,
    smart_format: String(options.smartFormat),
    interim_results: String(options.interimResults),
    diarize: String(options.diarize),
    encoding: options.encoding,
    sample_rate: String(options.sampleRate),
    channels: String(options.channels),
  });
  return `${endpoint}?${params.toString()}`;
}

// ==================== Session ====================

class DeepgramLiveSession implements TranscriptionSession {
  private finished = false;
  private connected = false;

  constructor(
    private readonly sessionId: string,
    private readonly ws: WebSocket,
    private readonly sink: LaneQueue<TranscriptEvent>,
    private readonly onClosed: (session: DeepgramLiveSession) => void
  ) {}

  get isActive(): boolean {
    return this.connected && !this.finished && this.ws.readyState === WebSocket.OPEN;
  }

  /**
   * Resolve once the socket is open; reject on error, early close or timeout
   */
  open(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.ws.terminate();
        reject(new Error(`[Deepgram] Connection timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      this.ws.once('open', () => {
        clearTimeout(timeout);
        this.connected = true;
        console.log(`[Deepgram] Connected for session ${this.sessionId}`);
        resolve();
      });

      this.ws.on('message', (data: WebSocket.RawData) => {
        this.handleMessage(data.toString());
      });

      this.ws.on('error', (error: Error) => {
        console.error(`[Deepgram] WebSocket error for session ${this.sessionId}:`, error.message);
        if (!this.connected) {
          clearTimeout(timeout);
          reject(error);
        }
      });

      this.ws.on('close', (code: number, reason: Buffer) => {
        clearTimeout(timeout);
        console.log(
          `[Deepgram] Connection closed for session ${this.sessionId}: ${code} ${reason.toString()}`
        );
        const wasConnected = this.connected;
        this.connected = false;
        this.onClosed(this);
        if (!wasConnected) {
          reject(new Error(`[Deepgram] Connection closed before open (${code})`));
        }
      });
    });
  }

  private handleMessage(raw: string): void {
    const event = parseDeepgramMessage(raw);
    if (!event) {
      return;
    }

    if (this.sink.isClosed) {
      return;
    }
    this.sink.put(event);
  }

  send(audio: Buffer): Promise<void> {
    if (!this.isActive) {
      return Promise.reject(new Error(`[Deepgram] Session ${this.sessionId} is not active`));
    }

    return new Promise((resolve, reject) => {
      this.ws.send(audio, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async finish(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.finished = true;

    if (this.ws.readyState === WebSocket.OPEN) {
      // Ask the provider to flush pending results before closing
      this.ws.send(JSON.stringify({ type: 'CloseStream' }));
      this.ws.close(1000, 'Session ended');
    }

    if (this.ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        this.ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);

      this.ws.once('close', () => {
        clearTimeout(timeout);
        resolve();
      });
    });
  }
}

// ==================== Adapter ====================

/**
 * Deepgram adapter for live speech-to-text
 */
export class DeepgramTranscriptionAdapter implements TranscriptionPort {
  private readonly apiKey?: string;
  private readonly endpoint: string;
  private readonly connectTimeoutMs: number;
  private readonly options: TranscriptionOptions;
  private readonly sessions = new Set<DeepgramLiveSession>();

  constructor(config: DeepgramConfig) {
    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint ?? 'wss://api.deepgram.com/v1/listen';
    this.connectTimeoutMs = config.connectTimeoutMs ?? 10000;
    this.options = { ...DEFAULT_TRANSCRIPTION_OPTIONS, ...config.options };
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  get openSessions(): number {
    return this.sessions.size;
  }

  async startSession(
    sessionId: string,
    sink: LaneQueue<TranscriptEvent>
  ): Promise<TranscriptionSession> {
    if (!this.apiKey) {
      throw new Error('[Deepgram] DEEPGRAM_API_KEY is not configured');
    }

    const ws = new WebSocket(buildListenUrl(this.endpoint, this.options), {
      headers: { Authorization: `Token ${this.apiKey}` },
    });

    const session = new DeepgramLiveSession(sessionId, ws, sink, (closed) => {
      this.sessions.delete(closed);
    });

    await session.open(this.connectTimeoutMs);
    this.sessions.add(session);
    return session;
  }

  async healthCheck(): Promise<boolean> {
    // No cheap probe on the streaming API; treat credentials as readiness
    return this.isConfigured();
  }

  async close(): Promise<void> {
    const open = [...this.sessions];
    this.sessions.clear();
    await Promise.all(open.map((session) => session.finish()));
    console.log('[Deepgram] Closed all sessions');
  }
}

/**
 * Create Deepgram adapter from the transcription section of the configuration
 */
export function createDeepgramTranscriptionAdapter(
  config: TranscriptionConfig
): DeepgramTranscriptionAdapter {
  return new DeepgramTranscriptionAdapter({
    apiKey: config.apiKey,
    endpoint: config.endpoint,
    connectTimeoutMs: config.connectTimeoutMs,
    options: {
      model: config.model,
      language: config.language,
      sampleRate: config.sampleRate,
    },
  });
}
