import { describe, it, expect } from 'vitest';
import { baseName, parsePathList } from './pathList';

describe('parsePathList', () => {
  it('should read one path per line', () => {
    expect(parsePathList('/v/a.mp4\r\n  /v/a.srt  \n\n')).toEqual(['/v/a.mp4', '/v/a.srt']);
  });

  it('should strip quotes and drop repeats', () => {
    expect(parsePathList('"C:\\Movies\\b.mkv"\n\'/v/b.ass\'\n/v/b.ass')).toEqual([
      'C:\\Movies\\b.mkv',
      '/v/b.ass',
    ]);
  });
});

describe('baseName', () => {
  it('should handle both separators', () => {
    expect(baseName('/home/me/clip.mp4')).toBe('clip.mp4');
    expect(baseName('C:\\Movies\\clip.mkv')).toBe('clip.mkv');
    expect(baseName('clip.srt')).toBe('clip.srt');
  });
});
