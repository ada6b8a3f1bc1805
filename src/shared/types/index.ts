export * from './config';
export * from './plugin';
export * from './s3';
