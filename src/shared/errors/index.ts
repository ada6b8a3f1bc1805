export * from './configValidation';
export * from './s3Operation';
export * from './s3Put';
export * from './scan';
