export * from './files';
export * from './path';
export * from './s3-params';
