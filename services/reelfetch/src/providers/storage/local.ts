import { cleanupOldArtifacts, storeArtifact } from '../../core/artifacts.js';
import type { ArtifactStorage, UploadArtifactRequest, UploadArtifactResult } from './types.js';

export interface LocalArtifactStorageOptions {
  directory: string;
  publicBaseUrl: string;
}

export class LocalArtifactStorage implements ArtifactStorage {
  readonly name = 'local';

  constructor(private readonly options: LocalArtifactStorageOptions) {}

  async uploadArtifact(request: UploadArtifactRequest): Promise<UploadArtifactResult> {
    const artifact = await storeArtifact({
      directory: this.options.directory,
      jobId: request.jobId,
      extension: request.extension,
      sourcePath: request.filePath,
    });

    return {
      downloadUrl: `${this.options.publicBaseUrl.replace(/\/+$/, '')}/artifacts/${artifact.fileName}`,
      sizeBytes: artifact.sizeBytes,
      sha256: artifact.sha256,
    };
  }

  async cleanupExpired(retentionHours: number): Promise<number> {
    return cleanupOldArtifacts(this.options.directory, retentionHours);
  }
}
