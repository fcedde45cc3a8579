const DURATION_PATTERN = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;
const TIME_PATTERN = /time=\s*(-?)(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;

function toSeconds(hours: string, minutes: string, seconds: string): number {
  return parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseFloat(seconds);
}

/**
 * Reads the input duration from a line like `  Duration: 00:01:23.45, start: ...`
 * @returns Seconds, or null when the line has no duration
 */
export function parseFfmpegDuration(line: string): number | null {
  const match = line.match(DURATION_PATTERN);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  return toSeconds(match[1], match[2], match[3]);
}

/**
 * Reads the encoded position from a progress line like `frame=  240 ... time=00:00:08.00 ...`
 */
export function parseFfmpegTime(line: string): number | null {
  const match = line.match(TIME_PATTERN);
  if (!match?.[2] || !match[3] || !match[4]) return null;
  // Negative while the first frames are still buffered
  if (match[1] === '-') return 0;
  return toSeconds(match[2], match[3], match[4]);
}

/**
 * Turns ffmpeg stderr lines into a completion ratio between 0 and 1.
 * Without a known duration (given, or read from ffmpeg's input banner) no progress is reported.
 */
export class FfmpegProgressTracker {
  private duration: number | null;

  constructor(duration?: number | null) {
    this.duration = duration && duration > 0 ? duration : null;
  }

  get knownDuration(): number | null {
    return this.duration;
  }

  /**
   * @returns The new ratio when the line reports progress, otherwise null
   */
  push(line: string): number | null {
    if (this.duration === null) {
      const duration = parseFfmpegDuration(line);
      if (duration !== null && duration > 0) {
        this.duration = duration;
      }
      return null;
    }

    const time = parseFfmpegTime(line);
    if (time === null) return null;
    return Math.min(time / this.duration, 1);
  }
}
