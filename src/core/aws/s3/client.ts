import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { type ExplicitCredentials, getAwsOptions } from '@core/aws/iam';
import {
  AWS_MAX_ATTEMPTS_DEFAULT,
  AWS_RETRY_MODE_ADAPTIVE,
  type AwsProviderExtended,
} from '@shared';
import { toEndpointUrl } from './endpoint';

export interface CreateS3ClientOptions {
  provider: AwsProviderExtended;
  endpoint?: string | null;
  /**
   * Overrides the provider region, e.g. the signing region of a mapped endpoint.
   */
  region?: string;
  credentials?: ExplicitCredentials;
}

/**
 * Creates an S3 client with adaptive retry strategy and global configuration.
 */
export function createS3Client(options: CreateS3ClientOptions): S3Client {
  const awsOptions = getAwsOptions(options.provider, options.credentials);

  const config: S3ClientConfig = {
    region: options.region ?? awsOptions.region,
    credentials: awsOptions.credentials,
    // Adaptive retry mode handles throttling and network issues intelligently.
    retryMode: AWS_RETRY_MODE_ADAPTIVE,
    maxAttempts: AWS_MAX_ATTEMPTS_DEFAULT,
  };

  if (options.endpoint) {
    config.endpoint = toEndpointUrl(options.endpoint);
  }

  return new S3Client(config);
}
