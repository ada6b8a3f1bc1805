export type PatternList = string | string[];

/**
 * Scalar YAML value; numbers and booleans are read as their string form.
 */
export type ConfigScalar = string | number | boolean;

export interface RawFileSelection {
  dir?: string;
  includes?: PatternList;
  excludes?: PatternList;
  [key: string]: unknown;
}

export interface RawContentTypeMapping {
  extension?: string;
  contentType?: string;
}

export interface RawCacheControlMapping {
  extension?: string;
  maxAge?: string | number;
}

export interface RawUploadJobConfig {
  bucket?: ConfigScalar;
  dest?: ConfigScalar | null;
  contentType?: ConfigScalar;
  cacheControl?: string | number;
  publicRead?: boolean | string;
  reducedRedundancy?: boolean | string;
  region?: ConfigScalar;
  enabled?: boolean | string;
  continueOnError?: boolean | string;
  guessContentType?: boolean | string;
  accessKey?: ConfigScalar;
  secretKey?: ConfigScalar;
  fileSets?: RawFileSelection[];
  contentTypeMappings?: RawContentTypeMapping[];
  cacheControlMappings?: RawCacheControlMapping[];
  [key: string]: unknown;
}

export interface RawS3PutConfig extends RawUploadJobConfig {
  jobs?: RawUploadJobConfig[];
  noPut?: boolean | string;
  hooks?: string[];
}

export interface FileSelection {
  dir: string;
  includes: string[];
  excludes: string[];
}

export interface ContentTypeRule {
  extension: string;
  contentType: string;
}

export interface CacheControlRule {
  extension: string;
  maxAge: number;
}

export type ExtensionRule = ContentTypeRule | CacheControlRule;

export interface UploadJob {
  readonly bucket: string;
  /**
   * Normalized destination prefix: empty, or ending in exactly one slash.
   */
  readonly dest: string;
  readonly contentType?: string;
  /**
   * Global max-age in seconds.
   */
  readonly cacheControl?: number;
  readonly publicRead: boolean;
  readonly reducedRedundancy: boolean;
  readonly region?: string;
  readonly enabled: boolean;
  /**
   * Keep uploading the remaining files after a failed upload.
   */
  readonly continueOnError: boolean;
  /**
   * Fall back to a MIME lookup by extension when no rule or global value applies.
   */
  readonly guessContentType: boolean;
  readonly accessKey?: string;
  readonly secretKey?: string;
  readonly fileSets: readonly FileSelection[];
  readonly contentTypeMappings: readonly ContentTypeRule[];
  readonly cacheControlMappings: readonly CacheControlRule[];
}
