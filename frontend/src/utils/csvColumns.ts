import type { CsvColumnRef, SubtitleFormat } from '../api';

const FORMATS_BY_EXTENSION: Record<string, SubtitleFormat> = {
  srt: 'srt',
  ass: 'ass',
  ssa: 'ass',
  csv: 'csv',
};

export const SUBTITLE_ACCEPT = '.srt,.ass,.ssa,.csv';
export const VIDEO_ACCEPT = '.mp4,.mov,.avi,.mkv,.webm';

/**
 * Subtitle format from a file name or path, null for unsupported extensions
 */
export function subtitleFormatOf(fileName: string): SubtitleFormat | null {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) return null;
  return FORMATS_BY_EXTENSION[fileName.slice(dot + 1).toLowerCase()] ?? null;
}

/**
 * Index of a column reference in the header row, -1 when it matches nothing
 */
export function columnIndex(ref: CsvColumnRef | null | undefined, columns: string[]): number {
  if (ref === null || ref === undefined) return -1;
  if (typeof ref === 'number') {
    return ref >= 0 && ref < columns.length ? ref : -1;
  }
  const byName = columns.indexOf(ref.trim());
  if (byName !== -1) return byName;
  return /^\d+$/.test(ref.trim()) ? columnIndex(parseInt(ref, 10), columns) : -1;
}

/**
 * Label for a column in the mapping selects
 */
export function columnLabel(columns: string[], index: number): string {
  const name = columns[index];
  return name ? `${index + 1}: ${name}` : `Column ${index + 1}`;
}
