import { config } from '../../config.js';
import { LocalArtifactStorage } from './local.js';
import { S3ArtifactStorage } from './s3.js';
import type { ArtifactStorage } from './types.js';

export function createArtifactStorage(): ArtifactStorage {
  if (config.storageBackend === 's3') {
    return new S3ArtifactStorage({
      bucket: config.s3Bucket,
      region: config.s3Region,
      endpoint: config.s3Endpoint || undefined,
      forcePathStyle: config.s3ForcePathStyle,
      accessKeyId: config.s3AccessKeyId,
      secretAccessKey: config.s3SecretAccessKey,
      keyPrefix: config.s3KeyPrefix,
      signedUrlTtlSeconds: config.s3SignedUrlTtlSeconds,
    });
  }
  return new LocalArtifactStorage({
    directory: config.artifactsDir,
    publicBaseUrl: config.publicBaseUrl,
  });
}
