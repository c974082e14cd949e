/**
 * Message Router
 *
 * Reads the wire, classifies each JSON message and moves it onto the audio or
 * video lane. Whatever ends the loop (disconnect, cancellation, a wire fault)
 * the lanes are closed with their sentinel on the way out so the lane
 * processors unwind on their own.
 */

import { z } from 'zod';
import {
  WireConnection,
  LaneQueue,
  InboundKind,
  InboundMessage,
  ImageFrameMessage,
  AudioChunkMessage,
  AudioStreamStopMessage,
  OtherMessage,
} from '@streamlens/domain';

export type AudioLaneMessage = AudioChunkMessage | AudioStreamStopMessage | OtherMessage;
export type VideoLaneMessage = ImageFrameMessage;

export interface SessionLanes {
  audio: LaneQueue<AudioLaneMessage>;
  video: LaneQueue<VideoLaneMessage>;
}

export interface RouterStats {
  received: number;
  audio: number;
  video: number;
  dropped: number;
  malformed: number;
}

const LOG_EVERY_N_MESSAGES = 50;

const AUDIO_TYPES = new Set(['audio', 'audio_stream']);
const AUDIO_STOP_TYPE = 'audio_stream_stop';

// Unknown keys are kept; clients send extra fields we do not use
const inboundSchema = z
  .object({
    type: z.string().nullish(),
    image: z.string().nullish(),
    audio: z.string().nullish(),
    audio_chunk: z.string().nullish(),
    processor: z.number().nullish(),
  })
  .passthrough();

/**
 * Classify one decoded wire message.
 *
 * Accepts the `{type, ...}` envelope as well as the typeless format that is
 * recognised only by an `image` or `audio_chunk` key. Returns null for
 * anything that belongs to neither lane.
 */
export function classifyInbound(payload: unknown): InboundMessage | null {
  const parsed = inboundSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const msg = parsed.data;
  const declaredType = msg.type ?? null;
  const hasAudioChunkKey =
    typeof payload === 'object' && payload !== null && 'audio_chunk' in payload;

  if (
    declaredType === AUDIO_STOP_TYPE ||
    (declaredType !== null && AUDIO_TYPES.has(declaredType)) ||
    hasAudioChunkKey
  ) {
    if (declaredType === AUDIO_STOP_TYPE) {
      return { kind: InboundKind.AUDIO_STREAM_STOP };
    }

    const audio = msg.audio_chunk || msg.audio;
    if (audio) {
      return { kind: InboundKind.AUDIO_CHUNK, audio, declared_type: declaredType };
    }
    return { kind: InboundKind.OTHER, declared_type: declaredType };
  }

  if (msg.image) {
    return {
      kind: InboundKind.IMAGE_FRAME,
      image: msg.image,
      processor: msg.processor ?? null,
      declared_type: declaredType,
    };
  }

  return null;
}

export function parseWireMessage(raw: string): unknown {
  return JSON.parse(raw);
}

/**
 * Route wire messages onto the session lanes until the wire ends.
 *
 * Never returns normally: rejects with WireDisconnectedError on disconnect
 * or AbortError on cancellation. Both lanes are closed on every exit path.
 */
export async function runMessageRouter(
  sessionId: string,
  wire: WireConnection,
  lanes: SessionLanes,
  stats: RouterStats,
  signal: AbortSignal
): Promise<never> {
  try {
    while (true) {
      const raw = await wire.receive(signal);
      stats.received++;

      let payload: unknown;
      try {
        payload = parseWireMessage(raw);
      } catch {
        stats.malformed++;
        console.warn(`[Router] ${sessionId}: dropping malformed message #${stats.received}`);
        continue;
      }

      const message = classifyInbound(payload);

      if (stats.received === 1 || stats.received % LOG_EVERY_N_MESSAGES === 0) {
        console.log(
          `[Router] ${sessionId}: msg #${stats.received} kind=${message?.kind ?? 'unroutable'}`
        );
      }

      if (!message) {
        stats.dropped++;
        console.warn(`[Router] ${sessionId}: dropping unroutable message #${stats.received}`);
        continue;
      }

      if (message.kind === InboundKind.IMAGE_FRAME) {
        lanes.video.put(message);
        stats.video++;
      } else {
        lanes.audio.put(message);
        stats.audio++;
      }
    }
  } finally {
    lanes.audio.close();
    lanes.video.close();
    console.log(
      `[Router] ${sessionId}: lanes closed after ${stats.received} messages ` +
        `(audio=${stats.audio}, video=${stats.video}, dropped=${stats.dropped + stats.malformed})`
    );
  }
}

export function createRouterStats(): RouterStats {
  return { received: 0, audio: 0, video: 0, dropped: 0, malformed: 0 };
}
