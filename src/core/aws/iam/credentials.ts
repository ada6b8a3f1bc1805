import {
  type AwsCredentials,
  type AwsProviderExtended,
  DEFAULT_REGION,
} from '@shared';

export interface AwsClientOptions {
  region: string;
  credentials?: AwsCredentials;
}

export interface ExplicitCredentials {
  accessKey?: string;
  secretKey?: string;
}

function isAwsCredentials(value: unknown): value is AwsCredentials {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'accessKeyId' in value &&
    typeof value.accessKeyId === 'string' &&
    'secretAccessKey' in value &&
    typeof value.secretAccessKey === 'string'
  );
}

/**
 * Resolves region and credentials for the S3 client.
 * A job's own key pair takes precedence over the provider's credentials.
 */
export function getAwsOptions(
  provider: AwsProviderExtended,
  explicit: ExplicitCredentials = {},
): AwsClientOptions {
  if (explicit.accessKey && explicit.secretKey) {
    return {
      region: provider.getRegion() || DEFAULT_REGION,
      credentials: {
        accessKeyId: explicit.accessKey,
        secretAccessKey: explicit.secretKey,
      },
    };
  }

  if (
    provider.cachedCredentials &&
    typeof provider.cachedCredentials.accessKeyId !== 'undefined' &&
    typeof provider.cachedCredentials.secretAccessKey !== 'undefined' &&
    typeof provider.cachedCredentials.sessionToken !== 'undefined'
  ) {
    return {
      region: provider.getRegion(),
      credentials: {
        accessKeyId: provider.cachedCredentials.accessKeyId,
        secretAccessKey: provider.cachedCredentials.secretAccessKey,
        sessionToken: provider.cachedCredentials.sessionToken,
      },
    };
  }

  const providerCredentials = provider.getCredentials();
  return {
    region:
      provider.getRegion() || providerCredentials.region || DEFAULT_REGION,
    credentials: isAwsCredentials(providerCredentials.credentials)
      ? providerCredentials.credentials
      : undefined,
  };
}
