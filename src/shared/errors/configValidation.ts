import { S3PutError } from './s3Put';

export class ConfigValidationError extends S3PutError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
