export { hexToAssColor } from '../subtitles';
export * from './styleFilter';
export * from './formats';
export * from './outputPath';
export * from './commandBuilder';
export * from './progress';
export * from './ffmpeg';
