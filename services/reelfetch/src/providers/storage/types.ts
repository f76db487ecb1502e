export interface UploadArtifactRequest {
  jobId: string;
  filePath: string;
  /** Name offered to the requester when downloading. */
  fileName: string;
  mimeType: string;
  extension: string;
}

export interface UploadArtifactResult {
  downloadUrl: string;
  sizeBytes: number;
  sha256: string;
}

export interface ArtifactStorage {
  readonly name: string;
  uploadArtifact(request: UploadArtifactRequest): Promise<UploadArtifactResult>;
  cleanupExpired(retentionHours: number): Promise<number>;
}
