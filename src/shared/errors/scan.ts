import { S3PutError } from './s3Put';

/**
 * Raised when a file selection cannot be scanned, e.g. its base directory
 * is missing or unreadable.
 */
export class ScanError extends S3PutError {
  constructor(
    message: string,
    public readonly dir?: string,
  ) {
    super(message);
    this.name = 'ScanError';
  }
}
