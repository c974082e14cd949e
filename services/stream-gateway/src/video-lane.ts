/**
 * Video Lane Processor
 *
 * Drains the video lane: every frame goes into the clip encoder and to the
 * session's captioner. Completed clips are handed to the upload pipeline
 * without waiting; captions go straight to the client and into the
 * annotation batch, tagged with the latest uploaded clip.
 */

import {
  LaneQueue,
  WireConnection,
  FrameCaptioner,
  CaptionOutbound,
  OutboundType,
  describeError,
} from '@streamlens/domain';
import { VideoLaneMessage } from './router.js';
import { ClipEncoder } from './clip-encoder.js';
import { UploadPipeline } from './upload-pipeline.js';
import { AnnotationBatcher } from './annotation-batcher.js';

export interface VideoLaneDeps {
  encoder: ClipEncoder;
  captioner: FrameCaptioner;
  uploads: UploadPipeline;
  batcher: AnnotationBatcher;
  wire: WireConnection;

  /** Capture clock */
  now?: () => Date;
}

export interface VideoLaneStats {
  frames: number;
  emptyFrames: number;
  clips: number;
  captions: number;
  sendFailures: number;
}

const LOG_BUFFER_EVERY_N_FRAMES = 50;

export function createVideoLaneStats(): VideoLaneStats {
  return { frames: 0, emptyFrames: 0, clips: 0, captions: 0, sendFailures: 0 };
}

/**
 * Drop a `data:image/jpeg;base64,` style prefix if present
 */
export function stripDataUrlPrefix(image: string): string {
  if (!image.startsWith('data:')) {
    return image;
  }
  const comma = image.indexOf(',');
  return comma === -1 ? image : image.slice(comma + 1);
}

/**
 * Process frames until the lane's sentinel, then flush the encoder and close
 * the upload queue. The upload queue is closed on every exit path.
 */
export async function runVideoLane(
  sessionId: string,
  queue: LaneQueue<VideoLaneMessage>,
  deps: VideoLaneDeps,
  stats: VideoLaneStats,
  signal: AbortSignal
): Promise<VideoLaneStats> {
  const now = deps.now ?? (() => new Date());

  try {
    for await (const message of queue.drain(signal)) {
      const bytes = Buffer.from(stripDataUrlPrefix(message.image), 'base64');
      if (bytes.length === 0) {
        stats.emptyFrames++;
        continue;
      }
      stats.frames++;

      const clip = await deps.encoder.addFrame(bytes, now());
      if (clip) {
        stats.clips++;
        deps.uploads.enqueue(clip);
        console.log(`[Clip] ${sessionId}: clip ${clip.clip_index} ready, queued for upload`);
      }

      const buffered = deps.encoder.bufferedFrames;
      if (buffered > 0 && buffered % LOG_BUFFER_EVERY_N_FRAMES === 0) {
        const seconds = deps.encoder.bufferedSeconds.toFixed(1);
        console.log(`[Clip] ${sessionId}: buffer ${buffered} frames, ${seconds}s elapsed`);
      }

      const caption = await deps.captioner.describe(bytes);
      if (!caption) {
        continue;
      }

      stats.captions++;
      const latestClip = deps.uploads.latest.current;
      deps.batcher.addCaption(caption, latestClip);

      const outbound: CaptionOutbound = {
        type: OutboundType.CAPTION,
        timestamp: caption.timestamp,
        description: caption.description,
        frame_number: caption.frame_number,
      };
      if (latestClip) {
        outbound.clip_key = latestClip.s3_key;
      }

      try {
        await deps.wire.send(outbound);
      } catch (error: unknown) {
        stats.sendFailures++;
        console.warn(`[Video] ${sessionId}: caption not delivered:`, describeError(error));
      }
      console.log(
        `[Moondream] ${sessionId}: #${caption.frame_number} | ${caption.description.slice(0, 50)}`
      );
    }

    const finalClip = await deps.encoder.flush();
    if (finalClip) {
      stats.clips++;
      deps.uploads.enqueue(finalClip);
    }
  } finally {
    deps.uploads.close();
  }

  console.log(
    `[Video] ${sessionId}: lane finished (frames=${stats.frames}, clips=${stats.clips}, ` +
      `captions=${stats.captions})`
  );
  return stats;
}
