import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { InputFileError, SubtitleParseError } from '../errors';
import { CsvMapping, StyleSettings } from '../settings';
import { parseAssContent } from './assParser';
import { buildAssDocument } from './assWriter';
import { parseCsvContent, parseCsvRecords } from './csvParser';
import { decodeSubtitleBuffer, DecodedSubtitle } from './encoding';
import { parseSrtContent } from './srtParser';
import { SubtitleFormat, SubtitleLine } from './types';

/** Number of lines shown in subtitle previews */
export const PREVIEW_LINE_LIMIT = 50;

export const SUBTITLE_EXTENSIONS: Record<string, SubtitleFormat> = {
  '.srt': 'srt',
  '.ass': 'ass',
  '.ssa': 'ass',
  '.csv': 'csv',
};

export interface LoadSubtitleOptions {
  /** Column mapping for CSV files; guessed from the header when absent */
  csvMapping?: CsvMapping | null;
}

export interface LoadedSubtitles {
  format: SubtitleFormat;
  lines: SubtitleLine[];
}

export interface PrepareSubtitleOptions extends LoadSubtitleOptions {
  /** Style for the generated ASS script of CSV files */
  style: StyleSettings;
  tempDir?: string;
}

export interface PreparedSubtitles extends LoadedSubtitles {
  /** The file ffmpeg's subtitles filter should read */
  burnPath: string;
  /** Removes any temporary file created for this run */
  cleanup: () => void;
}

/**
 * Maps a subtitle file name to its format
 * @throws InputFileError for extensions other than .srt, .ass, .ssa and .csv
 */
export function detectSubtitleFormat(filePath: string): SubtitleFormat {
  const format = SUBTITLE_EXTENSIONS[path.extname(filePath).toLowerCase()];
  if (!format) {
    throw new InputFileError(filePath, 'Unsupported subtitle format');
  }
  return format;
}

/**
 * Parses already decoded subtitle text.
 * Content with text in it that yields no subtitle line is malformed.
 */
export function parseSubtitleContent(
  content: string,
  format: SubtitleFormat,
  options: LoadSubtitleOptions = {}
): SubtitleLine[] {
  let lines: SubtitleLine[];
  switch (format) {
    case 'srt':
      lines = parseSrtContent(content);
      break;
    case 'ass':
      lines = parseAssContent(content);
      break;
    case 'csv':
      lines = parseCsvContent(content, options.csvMapping);
      break;
  }

  if (lines.length === 0 && content.trim()) {
    throw new SubtitleParseError(`No subtitle lines found in ${format.toUpperCase()} content`);
  }
  return lines;
}

function readSubtitleText(filePath: string): DecodedSubtitle {
  if (!fs.existsSync(filePath)) {
    throw new InputFileError(filePath, 'Subtitle file not found');
  }

  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFileError(filePath, `Cannot read subtitle file (${reason})`);
  }
  return decodeSubtitleBuffer(buffer);
}

/**
 * Returns the header row of a CSV subtitle file, for choosing a column mapping
 */
export function readCsvHeader(filePath: string): string[] {
  return (parseCsvRecords(readSubtitleText(filePath).text)[0] ?? []).map((name) => name.trim());
}

/**
 * Reads and parses a subtitle file
 * @throws InputFileError when the file is missing, unreadable or of an unknown type
 * @throws SubtitleParseError when the content is malformed
 */
export function loadSubtitleFile(filePath: string, options: LoadSubtitleOptions = {}): LoadedSubtitles {
  const format = detectSubtitleFormat(filePath);
  return { format, lines: parseSubtitleContent(readSubtitleText(filePath).text, format, options) };
}

function writeTempSubtitle(
  content: string,
  extension: string,
  tempDir: string
): Pick<PreparedSubtitles, 'burnPath' | 'cleanup'> {
  if (!fs.existsSync(tempDir)) {
    fs.mkdirSync(tempDir, { recursive: true });
  }

  const burnPath = path.join(tempDir, `${uuidv4()}${extension}`);
  fs.writeFileSync(burnPath, content, 'utf-8');

  return {
    burnPath,
    cleanup: () => {
      if (fs.existsSync(burnPath)) {
        fs.unlinkSync(burnPath);
      }
    },
  };
}

/**
 * Loads a subtitle file and works out what ffmpeg should burn.
 * UTF-8 SRT and ASS files are handed to ffmpeg as they are. Other encodings are
 * rewritten to a temporary UTF-8 copy, since libass drops cues it cannot decode.
 * CSV lines are written to a temporary ASS script carrying the run's style.
 */
export function prepareSubtitleForBurn(
  filePath: string,
  options: PrepareSubtitleOptions
): PreparedSubtitles {
  const format = detectSubtitleFormat(filePath);
  const decoded = readSubtitleText(filePath);
  const lines = parseSubtitleContent(decoded.text, format, options);
  const tempDir = options.tempDir ?? config.tempDir;

  if (format === 'csv') {
    return { format, lines, ...writeTempSubtitle(buildAssDocument(lines, options.style), '.ass', tempDir) };
  }
  if (decoded.encoding !== 'utf-8') {
    return { format, lines, ...writeTempSubtitle(decoded.text, path.extname(filePath).toLowerCase(), tempDir) };
  }
  return { format, lines, burnPath: filePath, cleanup: () => undefined };
}
