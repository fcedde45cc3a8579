import path from 'path';
import { describe, it, expect } from 'vitest';
import { deriveOutputPath } from './outputPath';

describe('deriveOutputPath', () => {
  it('should add _sub before the extension next to the input', () => {
    expect(deriveOutputPath('/videos/holiday.mp4')).toBe(path.join('/videos', 'holiday_sub.mp4'));
  });

  it('should keep only the last extension', () => {
    expect(deriveOutputPath('/videos/show.s01.mkv')).toBe(path.join('/videos', 'show.s01_sub.mkv'));
  });

  it('should use the output directory when given', () => {
    expect(deriveOutputPath('/videos/clip.mov', '/exports')).toBe(path.join('/exports', 'clip_sub.mov'));
  });

  it('should work for a bare file name', () => {
    expect(deriveOutputPath('clip.webm')).toBe('clip_sub.webm');
  });
});
