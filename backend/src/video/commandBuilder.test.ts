import { describe, it, expect } from 'vitest';
import { DEFAULT_STYLE } from '../settings';
import { FFmpegCommandBuilder, formatCommandLine } from './commandBuilder';
import { buildSubtitleFilter } from './styleFilter';

describe('FFmpegCommandBuilder', () => {
  it('should re-encode when a subtitle filter is applied', () => {
    const style = { ...DEFAULT_STYLE };
    const args = new FFmpegCommandBuilder()
      .video('/in/movie.mp4')
      .subtitles('/in/movie.srt', style)
      .encoder(20, 'slow')
      .output('/in/movie_sub.mp4')
      .build();

    expect(args).toEqual([
      '-y',
      '-i',
      '/in/movie.mp4',
      '-vf',
      buildSubtitleFilter('/in/movie.srt', style),
      '-c:v',
      'libx264',
      '-crf',
      '20',
      '-preset',
      'slow',
      '-c:a',
      'aac',
      '/in/movie_sub.mp4',
    ]);
  });

  it('should fall back to the default encoder settings', () => {
    const args = new FFmpegCommandBuilder({
      videoPath: 'a.mkv',
      subtitlePath: 'a.ass',
      style: { ...DEFAULT_STYLE },
      outputPath: 'a_sub.mkv',
    }).build();

    expect(args.slice(5)).toEqual(['-c:v', 'libx264', '-crf', '23', '-preset', 'veryfast', '-c:a', 'aac', 'a_sub.mkv']);
  });

  it('should stream copy only without a filter', () => {
    const args = new FFmpegCommandBuilder().video('a.mp4').output('b.mp4').build();
    expect(args).toEqual(['-y', '-i', 'a.mp4', '-c:v', 'copy', '-c:a', 'copy', 'b.mp4']);
  });

  it('should re-encode without a filter when copy is disabled', () => {
    const args = new FFmpegCommandBuilder().video('a.mp4').output('b.mp4').codecCopy(false).build();
    expect(args).toEqual(['-y', '-i', 'a.mp4', '-c:v', 'libx264', '-crf', '23', '-preset', 'veryfast', '-c:a', 'aac', 'b.mp4']);
  });

  it('should put extra options before the output path', () => {
    const args = new FFmpegCommandBuilder()
      .video('a.mp4')
      .output('b.mp4')
      .extra('-movflags', '+faststart')
      .build();
    expect(args.slice(-3)).toEqual(['-movflags', '+faststart', 'b.mp4']);
  });

  it('should require video and output paths', () => {
    expect(() => new FFmpegCommandBuilder().video('a.mp4').build()).toThrow(
      'Both a video path and an output path are required'
    );
  });
});

describe('formatCommandLine', () => {
  it('should quote arguments with spaces or quotes', () => {
    expect(formatCommandLine('ffmpeg', ['-i', 'my movie.mp4', "it's.mp4", 'out.mp4'])).toBe(
      `ffmpeg -i 'my movie.mp4' 'it'"'"'s.mp4' out.mp4`
    );
  });
});
