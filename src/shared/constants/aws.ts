import type { RegionEndpoint } from '../types/s3';

export const DEFAULT_REGION = 'us-east-1';

// S3 Limits and Defaults
export const S3_MULTIPART_UPLOAD_PART_SIZE = 5 * 1024 * 1024; // 5MB
export const S3_MULTIPART_UPLOAD_QUEUE_SIZE = 4;

// SDK Configurations
export const AWS_RETRY_MODE_ADAPTIVE = 'adaptive';
export const AWS_MAX_ATTEMPTS_DEFAULT = 5;

export const REGION_ENDPOINTS: Readonly<Record<string, RegionEndpoint>> =
  Object.freeze({
    EU: { hostname: 's3-eu-west-1.amazonaws.com', signingRegion: 'eu-west-1' },
    'us-west-1': {
      hostname: 's3-us-west-1.amazonaws.com',
      signingRegion: 'us-west-1',
    },
    'us-west-2': {
      hostname: 's3-us-west-2.amazonaws.com',
      signingRegion: 'us-west-2',
    },
    'ap-southeast-1': {
      hostname: 's3-ap-southeast-1.amazonaws.com',
      signingRegion: 'ap-southeast-1',
    },
    'ap-northeast-1': {
      hostname: 's3-ap-northeast-1.amazonaws.com',
      signingRegion: 'ap-northeast-1',
    },
    'sa-east-1': {
      hostname: 'sa-east-1.amazonaws.com',
      signingRegion: 'sa-east-1',
    },
  });
