/**
 * Transcript relay
 *
 * Reads the event channel the transcription adapter writes into. Every event
 * is forwarded to the client; final ones also go into the annotation batch.
 */

import {
  LaneQueue,
  WireConnection,
  TranscriptEvent,
  TranscriptOutbound,
  OutboundType,
  describeError,
} from '@streamlens/domain';
import { AnnotationBatcher } from './annotation-batcher.js';

export interface TranscriptRelayStats {
  interim: number;
  final: number;
  sendFailures: number;
}

export function createTranscriptRelayStats(): TranscriptRelayStats {
  return { interim: 0, final: 0, sendFailures: 0 };
}

export async function runTranscriptRelay(
  sessionId: string,
  sink: LaneQueue<TranscriptEvent>,
  wire: WireConnection,
  batcher: AnnotationBatcher,
  stats: TranscriptRelayStats,
  signal: AbortSignal
): Promise<TranscriptRelayStats> {
  for await (const event of sink.drain(signal)) {
    const outbound: TranscriptOutbound = {
      type: OutboundType.TRANSCRIPT,
      text: event.text,
      is_final: event.is_final,
      speaker: event.speaker,
    };

    try {
      await wire.send(outbound);
    } catch (error: unknown) {
      stats.sendFailures++;
      console.warn(`[STT] ${sessionId}: transcript not delivered:`, describeError(error));
    }

    if (event.is_final) {
      stats.final++;
      batcher.addTranscript(event);
      console.log(`>>> [STT FINAL] ${sessionId} [${event.speaker}] ${event.text}`);
    } else {
      stats.interim++;
    }
  }

  return stats;
}
