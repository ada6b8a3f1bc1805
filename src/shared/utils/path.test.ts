import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { buildObjectKey, normalizeDestinationPrefix, toS3Path } from './path';

describe('toS3Path', () => {
  it('replaces OS-specific separators with forward slashes', () => {
    const input = ['foo', 'bar', 'baz'].join(path.sep);
    expect(toS3Path(input)).toBe('foo/bar/baz');
  });

  it('removes leading slashes', () => {
    expect(toS3Path('/foo/bar')).toBe('foo/bar');
    expect(toS3Path('///foo/bar')).toBe('foo/bar');
  });

  it('collapses multiple slashes', () => {
    expect(toS3Path('foo//bar///baz')).toBe('foo/bar/baz');
  });

  it('forces backslashes to forward slashes regardless of OS', () => {
    expect(toS3Path('windows\\path\\style')).toBe('windows/path/style');
  });

  it('handles empty string', () => {
    expect(toS3Path('')).toBe('');
  });
});

describe('normalizeDestinationPrefix', () => {
  it('returns empty string for null and undefined', () => {
    expect(normalizeDestinationPrefix(null)).toBe('');
    expect(normalizeDestinationPrefix(undefined)).toBe('');
  });

  it('appends a trailing slash', () => {
    expect(normalizeDestinationPrefix('v1')).toBe('v1/');
    expect(normalizeDestinationPrefix('assets/v1')).toBe('assets/v1/');
  });

  it('keeps an existing trailing slash', () => {
    expect(normalizeDestinationPrefix('v1/')).toBe('v1/');
  });

  it('strips exactly one leading slash', () => {
    expect(normalizeDestinationPrefix('/v1')).toBe('v1/');
    expect(normalizeDestinationPrefix('//v1')).toBe('/v1/');
  });

  it('trims surrounding whitespace', () => {
    expect(normalizeDestinationPrefix('  /static  ')).toBe('static/');
  });

  it('normalizes whitespace-only and root inputs to empty string', () => {
    expect(normalizeDestinationPrefix('')).toBe('');
    expect(normalizeDestinationPrefix('   ')).toBe('');
    expect(normalizeDestinationPrefix('/')).toBe('');
  });

  it('is idempotent', () => {
    for (const input of ['v1', '/v1/', ' a/b ', 'x/', '/']) {
      const once = normalizeDestinationPrefix(input);
      expect(normalizeDestinationPrefix(once)).toBe(once);
    }
  });
});

describe('buildObjectKey', () => {
  it('joins prefix and relative path', () => {
    expect(buildObjectKey('v1/', 'css/app.css')).toBe('v1/css/app.css');
  });

  it('normalizes backslashes in the relative path', () => {
    expect(buildObjectKey('v1/', 'js\\app.js')).toBe('v1/js/app.js');
  });

  it('uses the relative path alone without a prefix', () => {
    expect(buildObjectKey('', 'index.html')).toBe('index.html');
  });
});
