import { SubtitleLine } from './types';

const SRT_TIMING_PATTERN =
  /(\d{1,2}:\d{2}:\d{2}[,.]\d{1,3})\s*-->\s*(\d{1,2}:\d{2}:\d{2}[,.]\d{1,3})/;

/**
 * Converts SRT timestamp format (HH:MM:SS,mmm) to seconds
 * @param timestamp - Timestamp in format "HH:MM:SS,mmm" or "HH:MM:SS.mmm"
 * @returns Time in seconds (float)
 */
export function srtTimeToSeconds(timestamp: string): number {
  // Normalize separator (SRT uses comma, some use period)
  const normalized = timestamp.trim().replace(',', '.');
  const parts = normalized.split(':');

  if (parts.length !== 3) {
    throw new Error(`Invalid SRT timestamp format: ${timestamp}`);
  }

  const hours = parseInt(parts[0] ?? '0', 10);
  const minutes = parseInt(parts[1] ?? '0', 10);
  const secondsParts = (parts[2] ?? '0').split('.');
  const seconds = parseInt(secondsParts[0] ?? '0', 10);
  const milliseconds = parseInt((secondsParts[1] ?? '0').padEnd(3, '0'), 10);

  if ([hours, minutes, seconds, milliseconds].some((n) => isNaN(n))) {
    throw new Error(`Invalid SRT timestamp format: ${timestamp}`);
  }

  return hours * 3600 + minutes * 60 + seconds + milliseconds / 1000;
}

/**
 * Parses SRT file content into subtitle lines.
 * The cue number line is optional; blocks without a valid timing line are skipped.
 * @param content - The raw SRT file content
 * @returns Array of parsed subtitle lines
 */
export function parseSrtContent(content: string): SubtitleLine[] {
  const entries: SubtitleLine[] = [];

  // Normalize line endings and split into blocks
  const normalizedContent = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  const blocks = normalizedContent.split(/\n\s*\n+/).filter((block) => block.trim());

  for (const block of blocks) {
    const lines = block.split('\n').filter((line) => line.trim());

    const timingLineIndex = lines.findIndex((line) => SRT_TIMING_PATTERN.test(line));
    if (timingLineIndex === -1 || timingLineIndex > 1) {
      continue;
    }

    let index = entries.length + 1;
    if (timingLineIndex === 1) {
      const parsedIndex = parseInt((lines[0] ?? '').trim(), 10);
      if (isNaN(parsedIndex)) {
        continue; // Text before the timing line that is not a cue number
      }
      index = parsedIndex;
    }

    const timestampMatch = (lines[timingLineIndex] ?? '').match(SRT_TIMING_PATTERN);
    if (!timestampMatch?.[1] || !timestampMatch[2]) {
      continue;
    }

    const text = lines
      .slice(timingLineIndex + 1)
      .join('\n')
      .trim();
    if (!text) {
      continue;
    }

    entries.push({
      index,
      startTime: srtTimeToSeconds(timestampMatch[1]),
      endTime: srtTimeToSeconds(timestampMatch[2]),
      text,
    });
  }

  return entries;
}
