export * from './types';
export * from './jobStore';
export * from './batch';
