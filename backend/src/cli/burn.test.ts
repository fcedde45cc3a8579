import chalk from 'chalk';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { FFmpegError, JobCancelledError } from '../errors';
import { BurnProcessor } from '../pipelines/burnPipeline';
import { SettingsStore } from '../settings';
import { FFmpegRunOptions, FFmpegRunResult } from '../video';
import { BurnOptions, CliOutput, exitCodeFor, resolveCsvMapping, runBurn } from './burn';

const SRT = '1\n00:00:01,000 --> 00:00:02,000\nHello\n';

class FakeFFmpeg implements BurnProcessor {
  readonly ffmpegPath = 'ffmpeg';
  available = true;
  runs: string[][] = [];
  outcome: (options: FFmpegRunOptions) => Promise<FFmpegRunResult> = async (options) => {
    options.onProgress?.(0.5);
    options.onProgress?.(1);
    return { exitCode: 0, stderrTail: '' };
  };

  isAvailable(): boolean {
    return this.available;
  }

  async getDuration(): Promise<number | null> {
    return 10;
  }

  run(args: string[], options: FFmpegRunOptions = {}): Promise<FFmpegRunResult> {
    this.runs.push(args);
    return this.outcome(options);
  }
}

class Capture implements CliOutput {
  text = '';

  write(text: string): void {
    this.text += text;
  }
}

function filterArg(args: string[] | undefined): string {
  if (!args) return '';
  return args[args.indexOf('-vf') + 1] ?? '';
}

describe('runBurn', () => {
  let rootDir: string;
  let videoPath: string;
  let subtitlePath: string;
  let settings: SettingsStore;
  let ffmpeg: FakeFFmpeg;
  let stdout: Capture;
  let stderr: Capture;
  let previousLevel: typeof chalk.level;

  const run = (options: Partial<BurnOptions> = {}): Promise<number> =>
    runBurn(
      {
        video: videoPath,
        subtitle: subtitlePath,
        codecCopy: true,
        overrides: {},
        csv: {},
        verbose: false,
        ...options,
      },
      { settings, ffmpeg, stdout, stderr, tempDir: path.join(rootDir, 'tmp') }
    );

  beforeEach(() => {
    previousLevel = chalk.level;
    chalk.level = 0;

    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subburn-cli-'));
    videoPath = path.join(rootDir, 'movie.mp4');
    subtitlePath = path.join(rootDir, 'movie.srt');
    fs.writeFileSync(videoPath, 'not really a video');
    fs.writeFileSync(subtitlePath, SRT);

    settings = new SettingsStore(path.join(rootDir, 'settings.json'));
    ffmpeg = new FakeFFmpeg();
    stdout = new Capture();
    stderr = new Capture();
  });

  afterEach(() => {
    chalk.level = previousLevel;
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('should write <stem>_sub<ext> next to the video by default', async () => {
    const expected = path.join(rootDir, 'movie_sub.mp4');

    expect(await run()).toBe(0);
    expect(ffmpeg.runs[0]?.slice(-1)).toEqual([expected]);
    expect(stdout.text).toBe(`Done: ${expected}\n`);
    expect(stderr.text).toContain('\rEncoding 50%\rEncoding 100%\n');
  });

  it('should honour an explicit output path', async () => {
    const output = path.join(rootDir, 'exports', 'final.mkv');

    expect(await run({ output })).toBe(0);
    expect(ffmpeg.runs[0]?.slice(-1)).toEqual([output]);
    expect(fs.existsSync(path.join(rootDir, 'exports'))).toBe(true);
  });

  it('should apply overrides without touching the settings file', async () => {
    settings.load();
    const before = fs.readFileSync(settings.filePath, 'utf-8');

    const code = await run({ overrides: { fontSize: 48, fontColor: '#ffcc00' }, crf: 18 });

    expect(code).toBe(0);
    const args = ffmpeg.runs[0] ?? [];
    expect(filterArg(args)).toContain('FontSize=48\\,PrimaryColour=&H0000CCFF');
    expect(args[args.indexOf('-crf') + 1]).toBe('18');
    expect(fs.readFileSync(settings.filePath, 'utf-8')).toBe(before);
  });

  it('should return ffmpeg exit code and print its error text', async () => {
    ffmpeg.outcome = async () => {
      throw new FFmpegError(2, 'Invalid data found when processing input');
    };

    expect(await run()).toBe(2);
    expect(stderr.text).toContain('Error: ffmpeg exited with code 2\nInvalid data found when processing input\n');
    expect(stdout.text).toBe('');
  });

  it('should return 1 for a missing video', async () => {
    fs.rmSync(videoPath);

    expect(await run()).toBe(1);
    expect(stderr.text).toBe(`\nError: Video file not found: ${videoPath}\n`);
    expect(ffmpeg.runs).toHaveLength(0);
  });

  it('should return 1 for an invalid colour', async () => {
    expect(await run({ overrides: { fontColor: 'blue' } })).toBe(1);
    expect(stderr.text).toBe('\nError: Invalid font color: "blue" is not a hex colour like #ffcc00\n');
    expect(ffmpeg.runs).toHaveLength(0);
  });

  it('should return 1 when ffmpeg is not installed', async () => {
    ffmpeg.available = false;

    expect(await run()).toBe(1);
    expect(stderr.text).toBe(
      '\nError: FFmpeg was not found at "ffmpeg". Install FFmpeg or set FFMPEG_PATH.\n'
    );
  });

  it('should burn CSV lines through a temporary ASS file', async () => {
    subtitlePath = path.join(rootDir, 'lines.csv');
    fs.writeFileSync(subtitlePath, 'start_time,end_time,text\n1,2,Hello\n');
    const tempDir = path.join(rootDir, 'tmp');
    let scriptsDuringRun: string[] = [];
    ffmpeg.outcome = async () => {
      scriptsDuringRun = fs.readdirSync(tempDir);
      return { exitCode: 0, stderrTail: '' };
    };

    expect(await run()).toBe(0);
    expect(scriptsDuringRun).toHaveLength(1);
    expect(filterArg(ffmpeg.runs[0])).toContain(tempDir);
    expect(fs.readdirSync(tempDir)).toEqual([]);
    expect(stderr.text).toContain('Loaded 1 CSV subtitle lines\n');
  });
});

describe('resolveCsvMapping', () => {
  let rootDir: string;
  let csvPath: string;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subburn-csvmap-'));
    csvPath = path.join(rootDir, 'lines.csv');
    fs.writeFileSync(csvPath, 'in,out,line\n1,2,Hello\n');
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('should put flags over a guess from the header', () => {
    expect(resolveCsvMapping(csvPath, undefined, { startColumn: 'in', textColumn: 'line' })).toEqual({
      startColumn: 'in',
      endColumn: 1,
      textColumn: 'line',
      timeUnit: 'seconds',
      fps: 30,
    });
  });

  it('should put flags over the saved mapping', () => {
    const saved = { startColumn: 'a', endColumn: null, textColumn: 'b', timeUnit: 'frames', fps: 24 } as const;

    expect(resolveCsvMapping(csvPath, saved, { fps: 25 })).toEqual({
      startColumn: 'a',
      endColumn: null,
      textColumn: 'b',
      timeUnit: 'frames',
      fps: 25,
    });
  });
});

describe('exitCodeFor', () => {
  it('should map failures to exit codes', () => {
    expect(exitCodeFor(new FFmpegError(183, ''))).toBe(183);
    expect(exitCodeFor(new FFmpegError(-1, '', 'Failed to start ffmpeg: ENOENT'))).toBe(1);
    expect(exitCodeFor(new JobCancelledError())).toBe(130);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});
