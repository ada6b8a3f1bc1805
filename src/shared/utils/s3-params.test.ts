import { describe, expect, it } from 'vitest';
import {
  findExtensionRule,
  formatCacheControl,
  type MetadataRules,
  resolveUploadMetadata,
} from './s3-params';

function rules(overrides: Partial<MetadataRules> = {}): MetadataRules {
  return {
    publicRead: false,
    reducedRedundancy: false,
    guessContentType: false,
    contentTypeMappings: [],
    cacheControlMappings: [],
    ...overrides,
  };
}

describe('findExtensionRule', () => {
  it('returns the first matching rule in declaration order', () => {
    const mappings = [
      { extension: '.min.js', contentType: 'A' },
      { extension: '.js', contentType: 'B' },
    ];
    expect(findExtensionRule('app.min.js', mappings)?.contentType).toBe('A');
    expect(findExtensionRule('app.js', mappings)?.contentType).toBe('B');
  });

  it('does not reorder rules by specificity', () => {
    const mappings = [
      { extension: '.js', contentType: 'B' },
      { extension: '.min.js', contentType: 'A' },
    ];
    expect(findExtensionRule('app.min.js', mappings)?.contentType).toBe('B');
  });

  it('matches suffixes case-sensitively', () => {
    const mappings = [{ extension: '.css', contentType: 'text/css' }];
    expect(findExtensionRule('STYLE.CSS', mappings)).toBeUndefined();
  });
});

describe('formatCacheControl', () => {
  it('formats a max-age header value', () => {
    expect(formatCacheControl(3600)).toBe('max-age=3600');
  });
});

describe('resolveUploadMetadata', () => {
  it('defaults to standard storage and no ACL, content type or cache control', () => {
    expect(resolveUploadMetadata('index.html', rules())).toEqual({
      storageClass: 'STANDARD',
    });
  });

  it('sets public-read ACL and reduced redundancy storage', () => {
    const result = resolveUploadMetadata(
      'index.html',
      rules({ publicRead: true, reducedRedundancy: true }),
    );
    expect(result.acl).toBe('public-read');
    expect(result.storageClass).toBe('REDUCED_REDUNDANCY');
  });

  it('prefers a matching content type rule over the global value', () => {
    const result = resolveUploadMetadata(
      'app.min.js',
      rules({
        contentType: 'application/octet-stream',
        contentTypeMappings: [
          { extension: '.min.js', contentType: 'A' },
          { extension: '.js', contentType: 'B' },
        ],
      }),
    );
    expect(result.contentType).toBe('A');
  });

  it('falls back to the global content type when no rule matches', () => {
    const result = resolveUploadMetadata(
      'logo.png',
      rules({
        contentType: 'application/octet-stream',
        contentTypeMappings: [{ extension: '.css', contentType: 'text/css' }],
      }),
    );
    expect(result.contentType).toBe('application/octet-stream');
  });

  it('guesses the content type only when enabled and nothing else applies', () => {
    expect(
      resolveUploadMetadata('style.css', rules({ guessContentType: true }))
        .contentType,
    ).toBe('text/css');
    expect(
      resolveUploadMetadata('style.css', rules()).contentType,
    ).toBeUndefined();
    expect(
      resolveUploadMetadata(
        'style.css',
        rules({ guessContentType: true, contentType: 'text/plain' }),
      ).contentType,
    ).toBe('text/plain');
  });

  it('leaves content type unset when guessing finds nothing', () => {
    const result = resolveUploadMetadata(
      'data.unknownext123',
      rules({ guessContentType: true }),
    );
    expect(result.contentType).toBeUndefined();
  });

  it('prefers a matching cache control rule over the global value', () => {
    const result = resolveUploadMetadata(
      'index.html',
      rules({
        cacheControl: 3600,
        cacheControlMappings: [{ extension: '.html', maxAge: 60 }],
      }),
    );
    expect(result.cacheControl).toBe('max-age=60');
  });

  it('falls back to the global cache control when no rule matches', () => {
    const result = resolveUploadMetadata(
      'app.js',
      rules({
        cacheControl: 3600,
        cacheControlMappings: [{ extension: '.html', maxAge: 60 }],
      }),
    );
    expect(result.cacheControl).toBe('max-age=3600');
  });

  it('keeps a zero max-age', () => {
    const result = resolveUploadMetadata(
      'index.html',
      rules({ cacheControl: 0 }),
    );
    expect(result.cacheControl).toBe('max-age=0');
  });
});
