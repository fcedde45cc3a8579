import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { describeError, FFmpegError, InputFileError, JobCancelledError } from '../errors';
import { BurnProcessor } from '../pipelines/burnPipeline';
import {
  applyStyleOverrides,
  CsvColumnRef,
  CsvMapping,
  CsvTimeUnit,
  EncoderPreset,
  SettingsStore,
  StyleOverrides,
  validateEncoder,
  validateStyle,
} from '../settings';
import { detectSubtitleFormat, guessCsvMapping, prepareSubtitleForBurn, readCsvHeader } from '../subtitles';
import { deriveOutputPath, FFmpegCommandBuilder, formatCommandLine } from '../video';

/** Exit code for a run stopped with Ctrl+C */
export const EXIT_INTERRUPTED = 130;

/**
 * CSV column flags; anything left out comes from the saved mapping or a header guess
 */
export interface CsvMappingFlags {
  startColumn?: CsvColumnRef;
  endColumn?: CsvColumnRef;
  textColumn?: CsvColumnRef;
  timeUnit?: CsvTimeUnit;
  fps?: number;
}

export interface BurnOptions {
  video: string;
  subtitle: string;
  output?: string;
  codecCopy: boolean;
  crf?: number;
  preset?: EncoderPreset;
  overrides: StyleOverrides;
  csv: CsvMappingFlags;
  verbose: boolean;
}

export interface CliOutput {
  write(text: string): void;
}

export interface BurnDependencies {
  settings: Pick<SettingsStore, 'load'>;
  ffmpeg: BurnProcessor;
  stdout: CliOutput;
  stderr: CliOutput;
  tempDir?: string;
  signal?: AbortSignal;
}

/**
 * Mapping used for a CSV file: flags over the saved mapping over a guess from its header
 */
export function resolveCsvMapping(
  subtitlePath: string,
  saved: CsvMapping | undefined,
  flags: CsvMappingFlags
): CsvMapping {
  const base = saved ?? guessCsvMapping(readCsvHeader(subtitlePath));
  return {
    startColumn: flags.startColumn ?? base.startColumn,
    endColumn: flags.endColumn ?? base.endColumn ?? null,
    textColumn: flags.textColumn ?? base.textColumn,
    timeUnit: flags.timeUnit ?? base.timeUnit,
    fps: flags.fps ?? base.fps,
  };
}

/**
 * Burns one subtitle file into one video.
 * Style overrides only affect this run; the settings file is read, never written.
 * @returns The path of the written video
 */
export async function burn(options: BurnOptions, deps: BurnDependencies): Promise<string> {
  const { stdout, stderr } = deps;

  const videoPath = path.resolve(options.video);
  if (!fs.existsSync(videoPath)) {
    throw new InputFileError(videoPath, 'Video file not found');
  }
  const subtitlePath = path.resolve(options.subtitle);
  const format = detectSubtitleFormat(subtitlePath);
  if (!fs.existsSync(subtitlePath)) {
    throw new InputFileError(subtitlePath, 'Subtitle file not found');
  }

  const settings = deps.settings.load();
  const style = validateStyle(applyStyleOverrides(settings.font, options.overrides));
  const encoder = validateEncoder({
    crf: options.crf ?? settings.crf,
    preset: options.preset ?? settings.preset,
  });

  const outputPath = path.resolve(options.output ?? deriveOutputPath(videoPath));
  if (outputPath === videoPath) {
    throw new InputFileError(outputPath, 'Output would overwrite the input video');
  }

  if (!deps.ffmpeg.isAvailable()) {
    throw new FFmpegError(
      -1,
      '',
      `FFmpeg was not found at "${deps.ffmpeg.ffmpegPath}". Install FFmpeg or set FFMPEG_PATH.`
    );
  }

  const csvMapping =
    format === 'csv' ? resolveCsvMapping(subtitlePath, settings.csvMappings[subtitlePath], options.csv) : null;
  const prepared = prepareSubtitleForBurn(subtitlePath, {
    style,
    csvMapping,
    tempDir: deps.tempDir ?? config.tempDir,
  });

  try {
    stderr.write(chalk.cyan(`Loaded ${prepared.lines.length} ${format.toUpperCase()} subtitle lines\n`));

    const args = new FFmpegCommandBuilder()
      .video(videoPath)
      .subtitles(prepared.burnPath, style)
      .encoder(encoder.crf, encoder.preset)
      .codecCopy(options.codecCopy)
      .output(outputPath)
      .build();
    stderr.write(chalk.gray(`Run: ${formatCommandLine(deps.ffmpeg.ffmpegPath, args)}\n`));

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    const duration = await deps.ffmpeg.getDuration(videoPath);

    let lastPercent = -1;
    await deps.ffmpeg.run(args, {
      signal: deps.signal,
      duration,
      onProgress: (ratio) => {
        const percent = Math.round(ratio * 100);
        if (percent === lastPercent) return;
        lastPercent = percent;
        stderr.write(`\rEncoding ${percent}%`);
      },
      onLine: (line) => {
        if (options.verbose) stderr.write(chalk.gray(`\n[ffmpeg] ${line}`));
      },
    });
    stderr.write('\n');
  } finally {
    prepared.cleanup();
  }

  stdout.write(`${chalk.green('Done:')} ${outputPath}\n`);
  return outputPath;
}

/**
 * Process exit code for a failed run: ffmpeg's own code when it ran and failed,
 * 1 for everything else
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof JobCancelledError) return EXIT_INTERRUPTED;
  if (error instanceof FFmpegError && error.exitCode > 0) return error.exitCode;
  return 1;
}

/**
 * Runs `burn` and reports any failure
 * @returns The process exit code
 */
export async function runBurn(options: BurnOptions, deps: BurnDependencies): Promise<number> {
  try {
    await burn(options, deps);
    return 0;
  } catch (error) {
    deps.stderr.write(`\n${chalk.red('Error:')} ${describeError(error)}\n`);
    return exitCodeFor(error);
  }
}
