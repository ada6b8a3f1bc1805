export * from './aws';
export * from './plugin';
