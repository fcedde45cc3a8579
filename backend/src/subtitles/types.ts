/**
 * A single timed subtitle line, whatever file format it came from
 */
export interface SubtitleLine {
  /** 1-based position (SRT cue number when the file provides one) */
  index: number;
  /** Start time in seconds */
  startTime: number;
  /** End time in seconds */
  endTime: number;
  /** The subtitle text, line breaks as "\n" */
  text: string;
}

export type SubtitleFormat = 'srt' | 'ass' | 'csv';
