import {
  type CacheControlRule,
  type ConfigScalar,
  ConfigValidationError,
  type ContentTypeRule,
  DEFAULT_INCLUDE_PATTERNS,
  type FileSelection,
  normalizeDestinationPrefix,
  type PatternList,
  type RawCacheControlMapping,
  type RawContentTypeMapping,
  type RawFileSelection,
  type RawS3PutConfig,
  type RawUploadJobConfig,
  type UploadJob,
} from '@shared';

const INTEGER_PATTERN = /^\+?\d+$/;

/**
 * Resolves the list of job configurations from the raw plugin configuration.
 * Supports a list of jobs, an object with a `jobs` list, or a single job object.
 * Any other object is read as a single job, so a missing bucket is reported
 * by validation.
 */
export function getJobConfigs(
  rawConfig?: RawS3PutConfig | RawUploadJobConfig[],
): RawUploadJobConfig[] | null {
  if (!rawConfig) {
    return null;
  }
  if (Array.isArray(rawConfig)) {
    return rawConfig;
  }
  if (rawConfig.jobs && Array.isArray(rawConfig.jobs)) {
    return rawConfig.jobs;
  }
  return [rawConfig];
}

/**
 * Parses a max-age value eagerly.
 * @throws {ConfigValidationError} If the value is not a non-negative integer.
 */
export function parseCacheControl(value: string | number): number {
  const text = String(value);
  if (!INTEGER_PATTERN.test(text)) {
    throw new ConfigValidationError(
      `Invalid cache control value '${text}': expected a non-negative integer number of seconds`,
    );
  }
  return Number.parseInt(text, 10);
}

/**
 * Splits a pattern list given either as an array or as a comma/space
 * separated string. A pattern ending in `/` matches everything below it.
 */
export function parsePatterns(patterns?: PatternList): string[] {
  const list = Array.isArray(patterns)
    ? patterns
    : (patterns ?? '').split(/[\s,]+/);
  return list
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0)
    .map((pattern) => (pattern.endsWith('/') ? `${pattern}**` : pattern));
}

export function parseFileSelection(raw: RawFileSelection): FileSelection {
  const includes = parsePatterns(raw.includes);
  return {
    dir: raw.dir ?? '',
    includes: includes.length > 0 ? includes : [...DEFAULT_INCLUDE_PATTERNS],
    excludes: parsePatterns(raw.excludes),
  };
}

function parseContentTypeMapping(raw: RawContentTypeMapping): ContentTypeRule {
  if (!raw.extension || raw.contentType === undefined) {
    throw new ConfigValidationError(
      'Invalid contentTypeMappings entry: extension and contentType are required',
    );
  }
  return { extension: raw.extension, contentType: raw.contentType };
}

function parseCacheControlMapping(
  raw: RawCacheControlMapping,
): CacheControlRule {
  if (!raw.extension || raw.maxAge === undefined) {
    throw new ConfigValidationError(
      'Invalid cacheControlMappings entry: extension and maxAge are required',
    );
  }
  return { extension: raw.extension, maxAge: parseCacheControl(raw.maxAge) };
}

function parseFlag(
  value: boolean | string | undefined,
  defaultValue = false,
): boolean {
  return String(value ?? defaultValue).toUpperCase() === 'TRUE';
}

/**
 * Reads a scalar setting as a string.
 * @throws {ConfigValidationError} If the value is a list or a mapping.
 */
export function parseConfigString(
  value: ConfigScalar | null | undefined,
  field: string,
): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (
    typeof value !== 'string' &&
    typeof value !== 'number' &&
    typeof value !== 'boolean'
  ) {
    throw new ConfigValidationError(
      `Invalid ${field} value: expected a string`,
    );
  }
  return String(value);
}

/**
 * Checks the fields a job cannot run without.
 * @throws {ConfigValidationError} If the target bucket is missing or empty.
 */
export function validateUploadJob(raw: RawUploadJobConfig): string {
  const bucket = parseConfigString(raw.bucket, 'bucket')?.trim();
  if (!bucket) {
    throw new ConfigValidationError('Target bucket not given. Cannot upload');
  }
  return bucket;
}

/**
 * Validates and normalizes a single job configuration entry.
 * @throws {ConfigValidationError} If the bucket is missing, a max-age is malformed
 * or a scalar setting holds a list or mapping.
 */
export function parseUploadJob(raw: RawUploadJobConfig): UploadJob {
  const bucket = validateUploadJob(raw);

  return Object.freeze({
    bucket,
    dest: normalizeDestinationPrefix(parseConfigString(raw.dest, 'dest')),
    contentType: parseConfigString(raw.contentType, 'contentType'),
    cacheControl:
      raw.cacheControl === undefined
        ? undefined
        : parseCacheControl(raw.cacheControl),
    publicRead: parseFlag(raw.publicRead),
    reducedRedundancy: parseFlag(raw.reducedRedundancy),
    region: parseConfigString(raw.region, 'region'),
    enabled: parseFlag(raw.enabled, true),
    continueOnError: parseFlag(raw.continueOnError),
    guessContentType: parseFlag(raw.guessContentType),
    accessKey: parseConfigString(raw.accessKey, 'accessKey'),
    secretKey: parseConfigString(raw.secretKey, 'secretKey'),
    fileSets: (raw.fileSets ?? []).map(parseFileSelection),
    contentTypeMappings: (raw.contentTypeMappings ?? []).map(
      parseContentTypeMapping,
    ),
    cacheControlMappings: (raw.cacheControlMappings ?? []).map(
      parseCacheControlMapping,
    ),
  });
}

/**
 * Checks if the deploy hook upload should be skipped based on configuration or CLI options.
 */
export function getNoPut(
  rawConfig?: RawS3PutConfig | RawUploadJobConfig[],
  optionNoPut?: boolean,
): boolean {
  if (optionNoPut) {
    return true;
  }
  if (!rawConfig || Array.isArray(rawConfig)) {
    return false;
  }
  return parseFlag(rawConfig.noPut);
}

/**
 * Retrieves the list of custom lifecycle hooks from the configuration.
 */
export function getCustomHooks(
  rawConfig?: RawS3PutConfig | RawUploadJobConfig[],
): string[] {
  if (!rawConfig || Array.isArray(rawConfig)) {
    return [];
  }
  return rawConfig.hooks ?? [];
}
