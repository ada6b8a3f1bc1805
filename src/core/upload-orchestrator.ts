import path from 'node:path';
import type { S3Client } from '@aws-sdk/client-s3';
import {
  buildObjectKey,
  type PluginLogger,
  type ProgressFactory,
  parseUploadJob,
  type RawUploadJobConfig,
  type ResolvedUpload,
  resolveUploadMetadata,
  type SelectedFile,
  type UploadJob,
} from '@shared';
import { resolveEndpoint, resolveSigningRegion, uploadFile } from './aws/s3';
import type { ExplicitCredentials } from './aws/iam';
import { expandSelections } from './selection';

export interface S3ClientTarget {
  endpoint: string | null;
  region?: string;
  credentials: ExplicitCredentials;
}

/**
 * Options for the UploadOrchestrator.
 */
export interface UploadOrchestratorOptions {
  servicePath: string;
  log: PluginLogger;
  progress: ProgressFactory;
  /**
   * Only jobs targeting this bucket run (the `--bucket` CLI option).
   */
  bucketFilter?: string;
  /**
   * Builds the client a job uploads through.
   */
  getS3Client: (target: S3ClientTarget) => S3Client;
}

/**
 * Computes the object key and metadata of one selected file.
 */
export function resolveUpload(
  file: SelectedFile,
  job: UploadJob,
): ResolvedUpload {
  return {
    key: buildObjectKey(job.dest, file.relativePath),
    localPath: file.localPath,
    ...resolveUploadMetadata(path.posix.basename(file.relativePath), job),
  };
}

/**
 * Runs upload jobs one after another, uploading one file at a time.
 */
export class UploadOrchestrator {
  constructor(private readonly options: UploadOrchestratorOptions) {}

  /**
   * Validates every job, then runs the enabled ones in declaration order.
   * @throws {ConfigValidationError} Before any upload, if a job is invalid.
   */
  async upload(
    rawJobs: RawUploadJobConfig[],
    invokedAsCommand?: boolean,
  ): Promise<void> {
    const jobs = rawJobs.map((raw) => parseUploadJob(raw));
    const { bucketFilter, log, progress } = this.options;

    const taskProgress = progress.create({
      message: bucketFilter
        ? `Uploading files to S3 (filtering by bucket: ${bucketFilter})`
        : 'Uploading files to S3',
    });

    try {
      for (const job of jobs) {
        if (!job.enabled) continue;
        if (bucketFilter && job.bucket !== bucketFilter) continue;
        await this.run(job);
      }

      if (invokedAsCommand) {
        log.success('Uploaded files to S3');
      } else {
        log.verbose('Uploaded files to S3');
      }
    } finally {
      taskProgress.remove();
    }
  }

  /**
   * Uploads every file selected by a job.
   * Upload failures abort the job unless `continueOnError` is set.
   */
  async run(job: UploadJob): Promise<void> {
    const { servicePath, log, progress, getS3Client } = this.options;

    const s3Client = getS3Client({
      endpoint: resolveEndpoint(job.region, log),
      region: resolveSigningRegion(job.region),
      credentials: { accessKey: job.accessKey, secretKey: job.secretKey },
    });

    const jobProgress = progress.create({
      message: `${job.bucket}: preparing...`,
    });
    const failedKeys: string[] = [];

    try {
      for await (const file of expandSelections(job.fileSets, {
        servicePath,
        log,
      })) {
        const upload = resolveUpload(file, job);
        jobProgress.update(`${job.bucket}: uploading ${upload.key}`);

        try {
          await uploadFile({ s3Client, bucket: job.bucket, ...upload });
        } catch (error) {
          if (!job.continueOnError) throw error;
          log.error(error instanceof Error ? error.message : String(error));
          failedKeys.push(upload.key);
          continue;
        }

        log.notice(
          `File: ${file.relativePath} copied to bucket: ${job.bucket} destination: ${upload.key}`,
        );
      }
    } finally {
      jobProgress.remove();
    }

    if (failedKeys.length > 0) {
      log.warning(
        `${failedKeys.length} file(s) failed to upload to bucket ${job.bucket}: ${failedKeys.join(', ')}`,
      );
    }
  }
}
