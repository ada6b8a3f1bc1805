import fs from 'node:fs';
import type { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import {
  type ResolvedUpload,
  S3_MULTIPART_UPLOAD_PART_SIZE,
  S3_MULTIPART_UPLOAD_QUEUE_SIZE,
  S3OperationError,
} from '@shared';

export interface UploadFileOptions extends ResolvedUpload {
  s3Client: S3Client;
  bucket: string;
}

/**
 * Streams a single local file to S3.
 * The read stream is released once the transfer settles.
 * @throws {S3OperationError} If S3 rejects the upload.
 */
export async function uploadFile(options: UploadFileOptions): Promise<void> {
  const {
    s3Client,
    bucket,
    key,
    localPath,
    acl,
    storageClass,
    contentType,
    cacheControl,
  } = options;

  const body = fs.createReadStream(localPath);

  try {
    const upload = new Upload({
      client: s3Client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: body,
        ACL: acl,
        StorageClass: storageClass,
        ContentType: contentType,
        CacheControl: cacheControl,
      },
      queueSize: S3_MULTIPART_UPLOAD_QUEUE_SIZE, // concurrent parts per file
      partSize: S3_MULTIPART_UPLOAD_PART_SIZE,
      leavePartsOnError: false,
    });

    await upload.done();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new S3OperationError(
      `Failed to upload ${localPath} to s3://${bucket}/${key}: ${reason}`,
      bucket,
      key,
    );
  } finally {
    body.destroy();
  }
}
