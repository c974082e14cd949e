/**
 * Annotation Batcher
 *
 * Collects captions and final transcripts for one session and writes them to
 * long-term memory as one coalesced record per kind per interval, instead of
 * one request per event.
 *
 * Append and snapshot-and-clear are both synchronous, so a flush never sees a
 * half-appended entry.
 */

import { setTimeout as sleep } from 'timers/promises';
import {
  MemoryPort,
  MemoryMetadataValue,
  MemoryRecordType,
  FlushReason,
  TranscriptEvent,
  CaptionEvent,
  CaptionBatchEntry,
  CombinedTranscript,
  CombinedCaption,
  UploadedClipMetadata,
  describeError,
} from '@streamlens/domain';

export const MULTIPLE_SPEAKERS = 'multiple';
export const CAPTION_SEPARATOR = ' | ';

export interface AnnotationBatcherOptions {
  sessionId: string;

  /** Memory owner every record is filed under */
  userScope: string;

  /** Flush interval in ms */
  intervalMs: number;
}

export interface BatcherStats {
  flushes: number;
  transcriptRequests: number;
  captionRequests: number;
  transcriptsBatched: number;
  captionsBatched: number;
  failedRequests: number;

  /** Annotations dropped because memory storage is not configured */
  discarded: number;
}

export interface MemoryEntry {
  content: string;
  metadata: Record<string, MemoryMetadataValue>;
}

// ==================== Combining ====================

export function combineTranscripts(events: TranscriptEvent[]): CombinedTranscript | null {
  if (events.length === 0) {
    return null;
  }

  const speakers = new Set(events.map((event) => event.speaker));
  const [onlySpeaker] = speakers;

  return {
    timestamp: events[0].timestamp,
    speaker: speakers.size === 1 && onlySpeaker !== undefined ? onlySpeaker : MULTIPLE_SPEAKERS,
    text: events.map((event) => event.text).join(' '),
    utterance_count: events.length,
  };
}

export function combineCaptions(entries: CaptionBatchEntry[]): CombinedCaption | null {
  const first = entries[0];
  const last = entries[entries.length - 1];
  if (!first || !last) {
    return null;
  }

  return {
    timestamp: first.caption.timestamp,
    description: entries.map((entry) => entry.caption.description).join(CAPTION_SEPARATOR),
    frame_number: last.caption.frame_number,
    clip: last.clip,
    caption_count: entries.length,
  };
}

export function transcriptMemoryEntry(combined: CombinedTranscript, sessionId: string): MemoryEntry {
  return {
    content: `At ${combined.timestamp}, ${combined.speaker} said: ${combined.text}`,
    metadata: {
      timestamp: combined.timestamp,
      speaker: combined.speaker,
      session_id: sessionId,
      type: MemoryRecordType.TRANSCRIPT,
      text: combined.text,
    },
  };
}

export function captionMemoryEntry(combined: CombinedCaption, sessionId: string): MemoryEntry {
  const metadata: Record<string, MemoryMetadataValue> = {
    timestamp: combined.timestamp,
    frame_number: combined.frame_number,
    type: MemoryRecordType.CAPTION,
    description: combined.description,
    session_id: sessionId,
  };

  if (combined.clip) {
    metadata.s3_clip_key = combined.clip.s3_key;
    metadata.s3_bucket = combined.clip.s3_bucket;
    metadata.clip_start_time = combined.clip.start_time;
    metadata.clip_end_time = combined.clip.end_time;
  }

  return {
    content: `At ${combined.timestamp}, I observed: ${combined.description}`,
    metadata,
  };
}

// ==================== Batcher ====================

export class AnnotationBatcher {
  private transcripts: TranscriptEvent[] = [];
  private captions: CaptionBatchEntry[] = [];
  readonly stats: BatcherStats = {
    flushes: 0,
    transcriptRequests: 0,
    captionRequests: 0,
    transcriptsBatched: 0,
    captionsBatched: 0,
    failedRequests: 0,
    discarded: 0,
  };
  private warnedUnconfigured = false;

  constructor(
    private readonly memory: MemoryPort,
    private readonly options: AnnotationBatcherOptions
  ) {}

  addTranscript(event: TranscriptEvent): void {
    this.transcripts.push(event);
  }

  addCaption(caption: CaptionEvent, clip: UploadedClipMetadata | null): void {
    this.captions.push({ caption, clip });
  }

  get pending(): { transcripts: number; captions: number } {
    return { transcripts: this.transcripts.length, captions: this.captions.length };
  }

  /**
   * Snapshot, clear and persist both batches.
   * Returns the number of memory requests made; 0 when both batches were empty.
   */
  async flush(reason: FlushReason): Promise<number> {
    const transcripts = this.transcripts;
    const captions = this.captions;
    this.transcripts = [];
    this.captions = [];

    if (transcripts.length === 0 && captions.length === 0) {
      return 0;
    }

    const { sessionId } = this.options;
    if (!this.memory.isConfigured()) {
      this.stats.discarded += transcripts.length + captions.length;
      if (!this.warnedUnconfigured) {
        this.warnedUnconfigured = true;
        console.warn(
          `[Mem0] ${sessionId}: memory storage not configured, annotations are not persisted`
        );
      }
      return 0;
    }

    this.stats.flushes++;
    let requests = 0;

    const combinedTranscript = combineTranscripts(transcripts);
    if (combinedTranscript) {
      requests++;
      if (await this.persist(transcriptMemoryEntry(combinedTranscript, sessionId), 'transcript')) {
        this.stats.transcriptRequests++;
        this.stats.transcriptsBatched += combinedTranscript.utterance_count;
        console.log(
          `[Mem0] ${sessionId}: batch transcript (${reason}): ` +
            `${combinedTranscript.utterance_count} utterances -> '${combinedTranscript.text.slice(0, 60)}'`
        );
      }
    }

    const combinedCaption = combineCaptions(captions);
    if (combinedCaption) {
      requests++;
      if (await this.persist(captionMemoryEntry(combinedCaption, sessionId), 'caption')) {
        this.stats.captionRequests++;
        this.stats.captionsBatched += combinedCaption.caption_count;
        console.log(
          `[Mem0] ${sessionId}: batch captions (${reason}): ` +
            `${combinedCaption.caption_count} frames -> '${combinedCaption.description.slice(0, 60)}'`
        );
      }
    }

    return requests;
  }

  private async persist(entry: MemoryEntry, kind: string): Promise<boolean> {
    try {
      await this.memory.add(entry.content, this.options.userScope, entry.metadata);
      return true;
    } catch (error: unknown) {
      this.stats.failedRequests++;
      console.error(
        `[Mem0] ${this.options.sessionId}: failed to store ${kind} batch:`,
        describeError(error)
      );
      return false;
    }
  }

  /**
   * Flush on a fixed interval until the signal aborts (rejects with AbortError)
   */
  async run(signal: AbortSignal): Promise<never> {
    while (true) {
      await sleep(this.options.intervalMs, undefined, { signal });
      await this.flush(FlushReason.INTERVAL);
    }
  }

  logSummary(): void {
    const { sessionId } = this.options;
    const total = this.stats.transcriptRequests + this.stats.captionRequests;
    console.log(
      `[Mem0] ${sessionId}: session summary: ` +
        `transcript requests=${this.stats.transcriptRequests} (batched ${this.stats.transcriptsBatched}), ` +
        `caption requests=${this.stats.captionRequests} (batched ${this.stats.captionsBatched}), ` +
        `failed=${this.stats.failedRequests}, discarded=${this.stats.discarded}, total=${total}`
    );
  }
}
