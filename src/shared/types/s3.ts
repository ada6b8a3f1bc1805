import type { ObjectCannedACL, StorageClass } from '@aws-sdk/client-s3';

export interface UploadMetadata {
  acl?: ObjectCannedACL;
  storageClass: StorageClass;
  contentType?: string;
  cacheControl?: string;
}

export interface SelectedFile {
  baseDir: string;
  /**
   * Path relative to baseDir, always with forward slashes.
   */
  relativePath: string;
  localPath: string;
}

export interface ResolvedUpload extends UploadMetadata {
  key: string;
  localPath: string;
}

export interface RegionEndpoint {
  hostname: string;
  signingRegion: string;
}
