export * from './client';
export * from './endpoint';
export * from './upload';
