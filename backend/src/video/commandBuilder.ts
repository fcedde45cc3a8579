import { DEFAULT_CRF, DEFAULT_PRESET, EncoderPreset, StyleSettings } from '../settings';
import { buildSubtitleFilter } from './styleFilter';

export interface BurnCommandOptions {
  videoPath?: string;
  /** Subtitle file for the subtitles filter; omitted means no filter */
  subtitlePath?: string;
  style?: StyleSettings;
  outputPath?: string;
  /** Stream copy is only used when no filter is applied */
  codecCopy?: boolean;
  crf?: number;
  preset?: EncoderPreset;
  extraOptions?: string[];
}

/**
 * Builds ffmpeg arguments for burning subtitles into a video
 */
export class FFmpegCommandBuilder {
  private options: BurnCommandOptions;

  constructor(options: BurnCommandOptions = {}) {
    this.options = { codecCopy: true, ...options };
  }

  video(videoPath: string): this {
    this.options.videoPath = videoPath;
    return this;
  }

  subtitles(subtitlePath: string, style: StyleSettings): this {
    this.options.subtitlePath = subtitlePath;
    this.options.style = style;
    return this;
  }

  output(outputPath: string): this {
    this.options.outputPath = outputPath;
    return this;
  }

  encoder(crf: number, preset: EncoderPreset): this {
    this.options.crf = crf;
    this.options.preset = preset;
    return this;
  }

  codecCopy(allowed: boolean): this {
    this.options.codecCopy = allowed;
    return this;
  }

  extra(...args: string[]): this {
    this.options.extraOptions = [...(this.options.extraOptions ?? []), ...args];
    return this;
  }

  /**
   * Returns the argument list, without the ffmpeg executable itself
   * @throws Error when the video or output path is missing
   */
  build(): string[] {
    const { videoPath, outputPath, subtitlePath, style } = this.options;
    if (!videoPath || !outputPath) {
      throw new Error('Both a video path and an output path are required');
    }

    const args = ['-y', '-i', videoPath];

    const filter = subtitlePath && style ? buildSubtitleFilter(subtitlePath, style) : null;
    if (filter) {
      args.push('-vf', filter);
    }

    if (this.options.codecCopy && !filter) {
      args.push('-c:v', 'copy', '-c:a', 'copy');
    } else {
      args.push(
        '-c:v',
        'libx264',
        '-crf',
        String(this.options.crf ?? DEFAULT_CRF),
        '-preset',
        this.options.preset ?? DEFAULT_PRESET,
        '-c:a',
        'aac'
      );
    }

    args.push(...(this.options.extraOptions ?? []), outputPath);
    return args;
  }
}

/**
 * Renders a command for logs, quoting arguments that contain shell-special characters
 */
export function formatCommandLine(executable: string, args: string[]): string {
  return [executable, ...args]
    .map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'"'"'`)}'`))
    .join(' ');
}
