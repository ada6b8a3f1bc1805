export const CONFIG_KEY = 's3Put';
export const PLUGIN_NAME = 'serverless-s3-put';
export const CACHE_CONTROL_MAX_AGE_PREFIX = 'max-age=';
export const DEFAULT_INCLUDE_PATTERNS: readonly string[] = ['**'];
export const IGNORED_FILE_NAMES = new Set(['.DS_Store']);
