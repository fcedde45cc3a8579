import { describe, it, expect } from 'vitest';
import { FfmpegProgressTracker, parseFfmpegDuration, parseFfmpegTime } from './progress';

const DURATION_LINE = '  Duration: 00:01:40.00, start: 0.000000, bitrate: 1205 kb/s';
const PROGRESS_LINE = 'frame=  240 fps=0.0 q=-1.0 size=     512kB time=00:00:25.00 bitrate= 167.8kbits/s speed=15.9x';

describe('parseFfmpegDuration', () => {
  it('should read the input duration', () => {
    expect(parseFfmpegDuration(DURATION_LINE)).toBe(100);
    expect(parseFfmpegDuration('  Duration: 01:02:03.50, start')).toBe(3723.5);
  });

  it('should ignore other lines', () => {
    expect(parseFfmpegDuration('  Duration: N/A, bitrate: N/A')).toBeNull();
    expect(parseFfmpegDuration(PROGRESS_LINE)).toBeNull();
  });
});

describe('parseFfmpegTime', () => {
  it('should read the encoded position', () => {
    expect(parseFfmpegTime(PROGRESS_LINE)).toBe(25);
  });

  it('should clamp negative positions to zero', () => {
    expect(parseFfmpegTime('time=-00:00:00.05 bitrate=N/A')).toBe(0);
  });

  it('should ignore lines without a time', () => {
    expect(parseFfmpegTime('Stream mapping:')).toBeNull();
  });
});

describe('FfmpegProgressTracker', () => {
  it('should learn the duration from the banner', () => {
    const tracker = new FfmpegProgressTracker();
    expect(tracker.push(PROGRESS_LINE)).toBeNull();
    expect(tracker.push(DURATION_LINE)).toBeNull();
    expect(tracker.knownDuration).toBe(100);
    expect(tracker.push(PROGRESS_LINE)).toBe(0.25);
  });

  it('should use a given duration and cap at 1', () => {
    const tracker = new FfmpegProgressTracker(20);
    expect(tracker.push(PROGRESS_LINE)).toBe(1);
  });

  it('should ignore a non-positive duration', () => {
    expect(new FfmpegProgressTracker(0).knownDuration).toBeNull();
  });
});
