/**
 * S3 Storage Adapter
 *
 * Implements the StoragePort interface on top of the AWS SDK v3.
 * Works against AWS S3 and, with a custom endpoint and path-style URLs,
 * against MinIO for local development.
 *
 * Features:
 * - Object upload with content type and user metadata
 * - Presigned GET URL generation
 * - Bucket bootstrap for local development
 */

import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { StoragePort, PutObjectResult, StorageConfig } from '@streamlens/domain';

export interface S3StorageConfig {
  /** Custom endpoint URL (e.g., http://localhost:9000 for MinIO) */
  endpoint?: string;

  /** Access key ID; the SDK default credential chain is used when unset */
  accessKeyId?: string;

  /** Secret access key */
  secretAccessKey?: string;

  /** AWS region */
  region?: string;

  /** Use path-style URLs (required for MinIO) */
  forcePathStyle?: boolean;

  /** Bucket probed by healthCheck */
  healthCheckBucket?: string;
}

/**
 * S3 adapter for clip and thumbnail storage
 */
export class S3StorageAdapter implements StoragePort {
  private config: S3StorageConfig;
  private client: S3Client;

  constructor(config: S3StorageConfig) {
    this.config = {
      region: 'us-east-1',
      forcePathStyle: false,
      ...config,
    };

    this.client = new S3Client({
      endpoint: this.config.endpoint,
      region: this.config.region,
      credentials:
        this.config.accessKeyId && this.config.secretAccessKey
          ? {
              accessKeyId: this.config.accessKeyId,
              secretAccessKey: this.config.secretAccessKey,
            }
          : undefined,
      forcePathStyle: this.config.forcePathStyle,
    });
  }

  // ==================== Object Operations ====================

  async putObject(
    bucket: string,
    key: string,
    data: Buffer,
    contentType: string,
    metadata?: Record<string, string>,
    signal?: AbortSignal
  ): Promise<PutObjectResult> {
    const command = new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: data,
      ContentType: contentType,
      Metadata: metadata,
    });

    const response = await this.client.send(command, { abortSignal: signal });
    console.log(`[S3] Uploaded ${bucket}/${key} (${data.length} bytes)`);

    return {
      etag: response.ETag?.replace(/"/g, '') || '',
      versionId: response.VersionId,
    };
  }

  async getPresignedUrl(bucket: string, key: string, expiresIn: number): Promise<string> {
    const command = new GetObjectCommand({ Bucket: bucket, Key: key });
    return getSignedUrl(this.client, command, { expiresIn });
  }

  // ==================== Bucket Operations ====================

  async ensureBucket(bucket: string): Promise<void> {
    try {
      const headCommand = new HeadBucketCommand({ Bucket: bucket });
      await this.client.send(headCommand);
    } catch (error: unknown) {
      if (errorName(error) === 'NotFound') {
        const createCommand = new CreateBucketCommand({ Bucket: bucket });
        await this.client.send(createCommand);
        console.log(`[S3] Created bucket: ${bucket}`);
      } else {
        throw error;
      }
    }
  }

  // ==================== Health & Cleanup ====================

  async healthCheck(): Promise<boolean> {
    const bucket = this.config.healthCheckBucket;
    if (!bucket) {
      // Nothing to probe; storage is optional
      return true;
    }

    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error: unknown) {
      console.error(`[S3] Health check failed for bucket ${bucket}:`, error);
      return false;
    }
  }

  async close(): Promise<void> {
    // S3Client doesn't have explicit close - it uses connection pooling
    this.client.destroy();
    console.log('[S3] Closed S3 client');
  }
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * Create S3 adapter from the storage section of the configuration
 */
export function createS3StorageAdapter(config: StorageConfig): S3StorageAdapter {
  return new S3StorageAdapter({
    endpoint: config.endpoint,
    accessKeyId: config.accessKeyId,
    secretAccessKey: config.secretAccessKey,
    region: config.region,
    forcePathStyle: config.forcePathStyle,
    healthCheckBucket: config.bucket ?? undefined,
  });
}
