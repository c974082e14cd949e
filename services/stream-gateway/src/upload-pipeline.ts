/**
 * Upload Pipeline
 *
 * Single consumer that persists completed clips off the video lane's
 * real-time path: clip and thumbnail to object storage, then one row in the
 * clip repository. Items are processed strictly in enqueue order.
 */

import {
  StoragePort,
  ClipRepositoryPort,
  ClipResult,
  UploadedClipMetadata,
  LaneQueue,
  clipObjectKey,
  thumbnailObjectKey,
  CLIP_CONTENT_TYPE,
  THUMBNAIL_CONTENT_TYPE,
  describeError,
  isAbortError,
} from '@streamlens/domain';

export interface UploadStats {
  received: number;
  uploaded: number;
  failed: number;
  skipped: number;
}

/**
 * Most recently uploaded clip of a session.
 * Written only by the upload worker; readers may see a value one clip old.
 */
export class LatestClipRef {
  private value: UploadedClipMetadata | null = null;

  get current(): UploadedClipMetadata | null {
    return this.value;
  }

  publish(metadata: UploadedClipMetadata): void {
    this.value = metadata;
  }
}

export interface UploadPipelineDeps {
  storage: StoragePort;
  clips: ClipRepositoryPort;
}

export class UploadPipeline {
  readonly queue = new LaneQueue<ClipResult>('upload');
  readonly latest = new LatestClipRef();
  readonly stats: UploadStats = { received: 0, uploaded: 0, failed: 0, skipped: 0 };

  constructor(
    private readonly sessionId: string,
    private readonly bucket: string | null,
    private readonly deps: UploadPipelineDeps
  ) {}

  /** Hand a clip over without waiting for its upload */
  enqueue(clip: ClipResult): void {
    this.queue.put(clip);
  }

  /** No more clips will arrive */
  close(): void {
    this.queue.close();
  }

  /**
   * Drain the queue until its sentinel. Rejects with AbortError if cancelled first.
   */
  async run(signal: AbortSignal): Promise<UploadStats> {
    const bucket = this.bucket;
    if (!bucket) {
      console.warn(
        `[Upload] ${this.sessionId}: S3_BUCKET_NAME not configured - clips will NOT be stored`
      );
    } else {
      console.log(`[Upload] ${this.sessionId}: storing clips in bucket ${bucket}`);
    }

    for await (const clip of this.queue.drain(signal)) {
      this.stats.received++;

      if (!bucket) {
        this.stats.skipped++;
        console.warn(`[Upload] ${this.sessionId}: skipping clip ${clip.clip_index} - no bucket`);
        continue;
      }

      try {
        const metadata = await this.upload(bucket, clip, signal);
        this.latest.publish(metadata);
        this.stats.uploaded++;
        console.log(`[Upload] ${this.sessionId}: clip ${clip.clip_index} complete: ${metadata.s3_key}`);
      } catch (error: unknown) {
        if (isAbortError(error)) {
          throw error;
        }
        this.stats.failed++;
        console.error(
          `[Upload] ${this.sessionId}: clip ${clip.clip_index} failed:`,
          describeError(error)
        );
      }
    }

    console.log(
      `[Upload] ${this.sessionId}: shutdown (uploaded=${this.stats.uploaded}, ` +
        `failed=${this.stats.failed}, skipped=${this.stats.skipped})`
    );
    return this.stats;
  }

  private async upload(
    bucket: string,
    clip: ClipResult,
    signal: AbortSignal
  ): Promise<UploadedClipMetadata> {
    const s3Key = clipObjectKey(this.sessionId, clip.clip_index);
    const metadata = {
      start_time: clip.start_time,
      end_time: clip.end_time,
      session_id: this.sessionId,
    };
    await this.deps.storage.putObject(bucket, s3Key, clip.video, CLIP_CONTENT_TYPE, metadata, signal);

    let thumbnailKey: string | null = null;
    if (clip.thumbnail) {
      thumbnailKey = thumbnailObjectKey(this.sessionId, clip.clip_index);
      await this.deps.storage.putObject(
        bucket,
        thumbnailKey,
        clip.thumbnail,
        THUMBNAIL_CONTENT_TYPE,
        undefined,
        signal
      );
    }

    const record = await this.deps.clips.insertClip({
      session_id: this.sessionId,
      clip_index: clip.clip_index,
      s3_key: s3Key,
      s3_bucket: bucket,
      start_time: new Date(clip.start_time),
      end_time: new Date(clip.end_time),
      thumbnail_s3_key: thumbnailKey,
    });
    console.log(`[DB] ${this.sessionId}: clip ${clip.clip_index} stored: id=${record.id}`);

    return {
      s3_key: s3Key,
      s3_bucket: bucket,
      start_time: clip.start_time,
      end_time: clip.end_time,
      thumbnail_s3_key: thumbnailKey,
    };
  }
}
