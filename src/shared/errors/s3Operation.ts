import { S3PutError } from './s3Put';

export class S3OperationError extends S3PutError {
  constructor(
    message: string,
    public readonly bucket?: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = 'S3OperationError';
  }
}
