/**
 * Storage port interface for S3-compatible object storage
 *
 * Production: AWS S3
 * Local: MinIO (same adapter, path-style URLs)
 *
 * Holds encoded clips and their thumbnails, partitioned by session id.
 */
export interface StoragePort {
  /**
   * Put object to storage. Rejects with an AbortError once signal aborts.
   */
  putObject(
    bucket: string,
    key: string,
    data: Buffer,
    contentType: string,
    metadata?: Record<string, string>,
    signal?: AbortSignal
  ): Promise<PutObjectResult>;

  /**
   * Generate presigned GET URL for object
   */
  getPresignedUrl(bucket: string, key: string, expiresIn: number): Promise<string>;

  /**
   * Create bucket if not exists
   */
  ensureBucket(bucket: string): Promise<void>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}

export interface PutObjectResult {
  /** ETag of uploaded object */
  etag: string;

  /** Version ID if versioning enabled */
  versionId?: string;
}

export const CLIP_CONTENT_TYPE = 'video/mp4';
export const THUMBNAIL_CONTENT_TYPE = 'image/jpeg';

function padClipIndex(clipIndex: number): string {
  return String(clipIndex).padStart(4, '0');
}

/**
 * Object key for an encoded clip, namespaced by session
 */
export function clipObjectKey(sessionId: string, clipIndex: number): string {
  return `${sessionId}/clips/clip_${padClipIndex(clipIndex)}.mp4`;
}

/**
 * Object key for a clip thumbnail, namespaced by session
 */
export function thumbnailObjectKey(sessionId: string, clipIndex: number): string {
  return `${sessionId}/thumbnails/thumb_${padClipIndex(clipIndex)}.jpg`;
}
