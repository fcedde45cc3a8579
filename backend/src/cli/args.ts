import { ArgumentParser } from 'argparse';
import { ENCODER_PRESETS, isEncoderPreset, isRecord, StyleOverrides } from '../settings';
import { BurnOptions, CsvMappingFlags } from './burn';

/**
 * Thrown instead of exiting the process when argparse finishes early
 * (help output, usage errors)
 */
export class CliExit extends Error {
  readonly status: number;

  constructor(status: number, message?: string) {
    super(message ?? '');
    this.name = 'CliExit';
    this.status = status;
  }
}

class CliArgumentParser extends ArgumentParser {
  exit(status: number = 0, message?: string): never {
    throw new CliExit(status, message);
  }
}

export function createParser(): ArgumentParser {
  const parser = new CliArgumentParser({
    prog: 'subburn',
    description: 'Burn subtitles into video files with ffmpeg',
  });
  const commands = parser.add_subparsers({ dest: 'command', required: true });

  const burn = commands.add_parser('burn', {
    help: 'burn a subtitle file into a video',
    description: 'Burn a subtitle file (srt, ass or csv) into a video. Style flags apply to this run only.',
  });
  burn.add_argument('video', { help: 'input video file' });
  burn.add_argument('-s', '--subtitle', { required: true, help: 'subtitle file (srt, ass, ssa or csv)' });
  burn.add_argument('-o', '--output', { help: 'output file, defaults to <name>_sub<ext> next to the video' });
  burn.add_argument('--no-copy', {
    action: 'store_true',
    help: 're-encode even when no subtitle filter is applied',
  });
  burn.add_argument('--crf', { type: 'int', help: 'x264 CRF (0-51), defaults to the saved setting' });
  burn.add_argument('--preset', { choices: [...ENCODER_PRESETS], help: 'x264 preset' });
  burn.add_argument('-v', '--verbose', { action: 'store_true', help: 'echo ffmpeg output' });

  const style = burn.add_argument_group({ title: 'style overrides' });
  style.add_argument('--font-family', { help: "font name, e.g. 'Noto Sans'" });
  style.add_argument('--font-size', { type: 'int', help: 'font size in px' });
  style.add_argument('--font-color', { help: 'text colour as hex, e.g. #ffcc00' });
  style.add_argument('--outline-color', { help: 'outline colour as hex, e.g. #000000' });
  style.add_argument('--outline-width', { type: 'float', help: 'outline width in px, 0 disables it' });
  style.add_argument('--margin-v', { type: 'int', help: 'bottom margin in px' });
  style.add_argument('--bold', { action: 'store_const', const: true, help: 'bold text' });
  const shadow = style.add_mutually_exclusive_group();
  shadow.add_argument('--shadow', { dest: 'shadow', action: 'store_const', const: true, help: 'drop shadow' });
  shadow.add_argument('--no-shadow', { dest: 'shadow', action: 'store_const', const: false, help: 'no drop shadow' });

  const csv = burn.add_argument_group({
    title: 'csv columns',
    description: 'column names or 0-based indexes; unset columns use the saved mapping or a header guess',
  });
  csv.add_argument('--csv-start', { help: 'start time column' });
  csv.add_argument('--csv-end', { help: 'end time column' });
  csv.add_argument('--csv-text', { help: 'text column' });
  csv.add_argument('--csv-unit', { choices: ['seconds', 'frames'], help: 'unit of the time columns' });
  csv.add_argument('--fps', { type: 'float', help: 'frame rate for frame-based times' });

  return parser;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
}

function readBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

function readOverrides(args: Record<string, unknown>): StyleOverrides {
  const overrides: StyleOverrides = {};
  const fontFamily = readString(args, 'font_family');
  const fontSize = readNumber(args, 'font_size');
  const fontColor = readString(args, 'font_color');
  const outlineColor = readString(args, 'outline_color');
  const outlineWidth = readNumber(args, 'outline_width');
  const marginV = readNumber(args, 'margin_v');
  const bold = readBoolean(args, 'bold');
  const shadow = readBoolean(args, 'shadow');

  if (fontFamily !== undefined) overrides.fontFamily = fontFamily;
  if (fontSize !== undefined) overrides.fontSize = fontSize;
  if (fontColor !== undefined) overrides.fontColor = fontColor;
  if (outlineColor !== undefined) overrides.outlineColor = outlineColor;
  if (outlineWidth !== undefined) overrides.outlineWidth = outlineWidth;
  if (marginV !== undefined) overrides.marginV = marginV;
  if (bold !== undefined) overrides.bold = bold;
  if (shadow !== undefined) overrides.shadow = shadow;
  return overrides;
}

function readCsvFlags(args: Record<string, unknown>): CsvMappingFlags {
  const flags: CsvMappingFlags = {};
  const startColumn = readString(args, 'csv_start');
  const endColumn = readString(args, 'csv_end');
  const textColumn = readString(args, 'csv_text');
  const unit = readString(args, 'csv_unit');
  const fps = readNumber(args, 'fps');

  if (startColumn !== undefined) flags.startColumn = startColumn;
  if (endColumn !== undefined) flags.endColumn = endColumn;
  if (textColumn !== undefined) flags.textColumn = textColumn;
  if (unit === 'seconds' || unit === 'frames') flags.timeUnit = unit;
  if (fps !== undefined) flags.fps = fps;
  return flags;
}

/**
 * Parses `burn` command arguments
 * @throws CliExit for --help and usage errors
 */
export function parseBurnArgs(argv: string[], verboseDefault: boolean = false): BurnOptions {
  const parsed: unknown = createParser().parse_args(argv);
  if (!isRecord(parsed)) {
    throw new CliExit(2, 'subburn: error: could not read arguments\n');
  }

  const video = readString(parsed, 'video');
  const subtitle = readString(parsed, 'subtitle');
  if (!video || !subtitle) {
    throw new CliExit(2, 'subburn: error: a video and a subtitle file are required\n');
  }

  const preset = parsed.preset;
  const options: BurnOptions = {
    video,
    subtitle,
    codecCopy: parsed.no_copy !== true,
    overrides: readOverrides(parsed),
    csv: readCsvFlags(parsed),
    verbose: parsed.verbose === true || verboseDefault,
  };

  const output = readString(parsed, 'output');
  const crf = readNumber(parsed, 'crf');
  if (output !== undefined) options.output = output;
  if (crf !== undefined) options.crf = crf;
  if (isEncoderPreset(preset)) options.preset = preset;

  return options;
}
