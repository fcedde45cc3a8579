export * from './types';
export * from './defaults';
export * from './validation';
export * from './settingsStore';
