export * from './types';
export * from './encoding';
export * from './srtParser';
export * from './assParser';
export * from './assWriter';
export * from './csvParser';
export * from './subtitleLoader';
