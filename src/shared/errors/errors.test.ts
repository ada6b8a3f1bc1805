import { describe, expect, it } from 'vitest';
import { ConfigValidationError } from './configValidation';
import { S3OperationError } from './s3Operation';
import { S3PutError } from './s3Put';
import { ScanError } from './scan';

describe('S3PutError', () => {
  it('has correct message and name', () => {
    const err = new S3PutError('something failed');
    expect(err.message).toBe('something failed');
    expect(err.name).toBe('S3PutError');
  });

  it('is instanceof Error', () => {
    expect(new S3PutError('test')).toBeInstanceOf(Error);
  });
});

describe('ConfigValidationError', () => {
  it('extends S3PutError', () => {
    const err = new ConfigValidationError('bad config');
    expect(err).toBeInstanceOf(S3PutError);
    expect(err.name).toBe('ConfigValidationError');
    expect(err.message).toBe('bad config');
  });
});

describe('ScanError', () => {
  it('extends S3PutError', () => {
    expect(new ScanError('missing')).toBeInstanceOf(S3PutError);
  });

  it('keeps the scanned directory', () => {
    const err = new ScanError('missing', '/tmp/build');
    expect(err.dir).toBe('/tmp/build');
    expect(err.name).toBe('ScanError');
  });
});

describe('S3OperationError', () => {
  it('extends S3PutError', () => {
    expect(new S3OperationError('fail')).toBeInstanceOf(S3PutError);
  });

  it('has optional bucket and key fields', () => {
    const err = new S3OperationError('op failed', 'my-bucket', 'v1/app.js');
    expect(err.bucket).toBe('my-bucket');
    expect(err.key).toBe('v1/app.js');
    expect(err.name).toBe('S3OperationError');
  });

  it('works without bucket', () => {
    const err = new S3OperationError('op failed');
    expect(err.bucket).toBeUndefined();
    expect(err.key).toBeUndefined();
  });
});
