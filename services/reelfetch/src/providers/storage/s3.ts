import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { sha256File } from '../../core/artifacts.js';
import type { ArtifactStorage, UploadArtifactRequest, UploadArtifactResult } from './types.js';

export interface S3ArtifactStorageOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  accessKeyId: string;
  secretAccessKey: string;
  keyPrefix: string;
  signedUrlTtlSeconds: number;
}

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export function buildObjectKey(prefix: string, jobId: string, extension: string, now = new Date()): string {
  const dateFolder = now.toISOString().slice(0, 10);
  const normalized = normalizePrefix(prefix);
  return normalized ? `${normalized}/${dateFolder}/${jobId}.${extension}` : `${dateFolder}/${jobId}.${extension}`;
}

function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

export class S3ArtifactStorage implements ArtifactStorage {
  readonly name = 's3';
  private readonly client: S3Client;

  constructor(private readonly options: S3ArtifactStorageOptions) {
    this.client = new S3Client({
      endpoint: options.endpoint,
      region: options.region,
      forcePathStyle: options.forcePathStyle,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  async uploadArtifact(request: UploadArtifactRequest): Promise<UploadArtifactResult> {
    const key = buildObjectKey(this.options.keyPrefix, request.jobId, request.extension);
    const sha256 = await sha256File(request.filePath);
    const { size } = await stat(request.filePath);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: createReadStream(request.filePath),
        ContentLength: size,
        ContentType: request.mimeType,
        ContentDisposition: contentDisposition(request.fileName),
        Metadata: { sha256 },
      }),
    );

    const downloadUrl = await getSignedUrl(
      this.client,
      new GetObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
      }),
      { expiresIn: this.options.signedUrlTtlSeconds },
    );

    return { downloadUrl, sizeBytes: size, sha256 };
  }

  async cleanupExpired(_retentionHours: number): Promise<number> {
    // Expiry is left to the bucket's lifecycle rules.
    return 0;
  }
}
