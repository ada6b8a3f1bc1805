export class S3PutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'S3PutError';
  }
}
