import { ObjectCannedACL, StorageClass } from '@aws-sdk/client-s3';
import mime from 'mime';
import { CACHE_CONTROL_MAX_AGE_PREFIX } from '../constants/plugin';
import type { ExtensionRule, UploadJob } from '../types/config';
import type { UploadMetadata } from '../types/s3';

export type MetadataRules = Pick<
  UploadJob,
  | 'publicRead'
  | 'reducedRedundancy'
  | 'contentType'
  | 'cacheControl'
  | 'guessContentType'
  | 'contentTypeMappings'
  | 'cacheControlMappings'
>;

/**
 * Returns the first rule, in declaration order, whose extension is a
 * case-sensitive suffix of the file name.
 */
export function findExtensionRule<T extends ExtensionRule>(
  fileName: string,
  rules: readonly T[],
): T | undefined {
  return rules.find((rule) => fileName.endsWith(rule.extension));
}

export function formatCacheControl(maxAge: number): string {
  return `${CACHE_CONTROL_MAX_AGE_PREFIX}${maxAge}`;
}

/**
 * Resolves ACL, storage class, Content-Type and Cache-Control for a file.
 *
 * A matching extension rule always wins over the job-wide value; the
 * job-wide value is only used when no rule matched. Attributes with
 * neither are left unset so the S3 defaults apply.
 */
export function resolveUploadMetadata(
  fileName: string,
  rules: MetadataRules,
): UploadMetadata {
  const metadata: UploadMetadata = {
    storageClass: rules.reducedRedundancy
      ? StorageClass.REDUCED_REDUNDANCY
      : StorageClass.STANDARD,
  };

  if (rules.publicRead) {
    metadata.acl = ObjectCannedACL.public_read;
  }

  const contentTypeRule = findExtensionRule(
    fileName,
    rules.contentTypeMappings,
  );
  if (contentTypeRule) {
    metadata.contentType = contentTypeRule.contentType;
  } else if (rules.contentType !== undefined) {
    metadata.contentType = rules.contentType;
  } else if (rules.guessContentType) {
    metadata.contentType = mime.getType(fileName) ?? undefined;
  }

  const cacheControlRule = findExtensionRule(
    fileName,
    rules.cacheControlMappings,
  );
  if (cacheControlRule) {
    metadata.cacheControl = formatCacheControl(cacheControlRule.maxAge);
  } else if (rules.cacheControl !== undefined) {
    metadata.cacheControl = formatCacheControl(rules.cacheControl);
  }

  return metadata;
}
