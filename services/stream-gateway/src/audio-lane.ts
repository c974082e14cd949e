/**
 * Audio Lane Processor
 *
 * Drains the audio lane and forwards decoded PCM to the session's live
 * transcription. Chunks open a transcription session on demand; a stop ends
 * it while the lane keeps running, so the client can toggle its microphone
 * any number of times on one connection.
 */

import { InboundKind, LaneQueue, describeError } from '@streamlens/domain';
import { AudioLaneMessage } from './router.js';
import { TranscriptionLink } from './transcription-link.js';

export interface AudioLaneStats {
  chunks: number;
  forwarded: number;
  dropped: number;
  sendFailures: number;
  stops: number;
}

const LOG_EVERY_N_CHUNKS = 10;
const WARN_EVERY_N_DROPS = 50;

export function createAudioLaneStats(): AudioLaneStats {
  return { chunks: 0, forwarded: 0, dropped: 0, sendFailures: 0, stops: 0 };
}

export function decodeAudioChunk(payload: string): Buffer {
  return Buffer.from(payload, 'base64');
}

/**
 * Process audio messages until the lane's sentinel.
 * Per-chunk failures are logged and skipped; only cancellation rejects.
 */
export async function runAudioLane(
  sessionId: string,
  queue: LaneQueue<AudioLaneMessage>,
  transcription: TranscriptionLink,
  stats: AudioLaneStats,
  signal: AbortSignal
): Promise<AudioLaneStats> {
  for await (const message of queue.drain(signal)) {
    switch (message.kind) {
      case InboundKind.AUDIO_STREAM_STOP:
        stats.stops++;
        try {
          if (await transcription.stop()) {
            console.log(
              `[Audio] ${sessionId}: stream stopped by client (processed ${stats.forwarded} chunks)`
            );
          } else {
            console.log(`[Audio] ${sessionId}: stop received with no audio in flight`);
          }
        } catch (error: unknown) {
          console.error(`[Audio] ${sessionId}: error ending transcription:`, describeError(error));
        }
        break;

      case InboundKind.AUDIO_CHUNK: {
        stats.chunks++;
        const audio = decodeAudioChunk(message.audio);
        try {
          if (!(await transcription.send(audio))) {
            stats.dropped++;
            if (stats.dropped === 1 || stats.dropped % WARN_EVERY_N_DROPS === 0) {
              console.warn(
                `[Audio] ${sessionId}: no active transcription, dropped ${stats.dropped} chunks`
              );
            }
            break;
          }
          stats.forwarded++;
          if (stats.forwarded % LOG_EVERY_N_CHUNKS === 0) {
            console.log(`[Audio] ${sessionId}: chunk #${stats.forwarded} forwarded`);
          }
        } catch (error: unknown) {
          stats.sendFailures++;
          console.error(`[Audio] ${sessionId}: error sending audio:`, describeError(error));
        }
        break;
      }

      case InboundKind.OTHER:
        console.log(
          `[Audio] ${sessionId}: ignoring ${message.declared_type ?? 'untyped'} message without audio`
        );
        break;
    }
  }

  console.log(
    `[Audio] ${sessionId}: lane finished (forwarded=${stats.forwarded}, dropped=${stats.dropped})`
  );
  return stats;
}
