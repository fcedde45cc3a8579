import { SubtitleParseError } from '../errors';
import { CsvColumnRef, CsvMapping, DEFAULT_CSV_LINE_DURATION, DEFAULT_CSV_MAPPING } from '../settings';
import { SubtitleLine } from './types';

/**
 * Splits CSV text into records of raw cells (RFC 4180 quoting, CRLF or LF).
 * Blank lines are dropped.
 */
export function parseCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let inQuotes = false;

  const endRecord = (): void => {
    record.push(cell);
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
    cell = '';
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"' && cell === '') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(cell);
      cell = '';
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r') {
      if (content[i + 1] === '\n') i++;
      endRecord();
    } else {
      cell += char;
    }
  }

  if (inQuotes) {
    throw new SubtitleParseError('CSV file ends inside a quoted field');
  }
  if (cell !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Guesses the column mapping from the header row: "start_time", "end_time"
 * and "text" columns when present, otherwise the first three columns
 */
export function guessCsvMapping(header: string[]): CsvMapping {
  const names = header.map((name) => name.trim());
  const pick = (name: string, fallback: number): CsvColumnRef =>
    names.includes(name) ? name : fallback;

  if (names.length < 3 && !names.includes('text')) {
    return {
      ...DEFAULT_CSV_MAPPING,
      startColumn: pick('start_time', 0),
      endColumn: null,
      textColumn: 1,
    };
  }

  return {
    ...DEFAULT_CSV_MAPPING,
    startColumn: pick('start_time', 0),
    endColumn: pick('end_time', 1),
    textColumn: pick('text', 2),
  };
}

/**
 * Finds the cell index of a column given by header name or 0-based index
 */
export function resolveCsvColumn(ref: CsvColumnRef, header: string[]): number {
  if (typeof ref === 'number') {
    if (ref < 0 || ref >= header.length) {
      throw new SubtitleParseError(`CSV column ${ref} is out of range (${header.length} columns)`);
    }
    return ref;
  }

  const byName = header.findIndex((name) => name.trim() === ref.trim());
  if (byName !== -1) {
    return byName;
  }
  if (/^\d+$/.test(ref.trim())) {
    return resolveCsvColumn(parseInt(ref, 10), header);
  }

  throw new SubtitleParseError(`CSV column "${ref}" not found in header`);
}

function cellToSeconds(cell: string, mapping: CsvMapping): number {
  const trimmed = cell.trim();
  if (!trimmed) return NaN;
  const value = Number(trimmed);
  return mapping.timeUnit === 'frames' ? value / mapping.fps : value;
}

/**
 * Parses CSV subtitle content using a column mapping.
 * The first record is the header. A missing, unreadable or non-increasing end
 * time gives the line a fixed on-screen duration.
 * @param content - The raw CSV content
 * @param mapping - Column mapping, guessed from the header when omitted
 */
export function parseCsvContent(content: string, mapping?: CsvMapping | null): SubtitleLine[] {
  const [header, ...rows] = parseCsvRecords(content);
  if (!header) {
    return [];
  }

  const effective = mapping ?? guessCsvMapping(header);
  if (effective.timeUnit === 'frames' && !(effective.fps > 0)) {
    throw new SubtitleParseError(`Invalid frame rate for CSV frame times: ${effective.fps}`);
  }

  const startIndex = resolveCsvColumn(effective.startColumn, header);
  const textIndex = resolveCsvColumn(effective.textColumn, header);
  const endIndex =
    effective.endColumn === null || effective.endColumn === undefined
      ? null
      : resolveCsvColumn(effective.endColumn, header);

  const entries: SubtitleLine[] = [];

  rows.forEach((row, rowIndex) => {
    // Row numbers as shown in a spreadsheet: header is row 1
    const rowNumber = rowIndex + 2;
    const startCell = row[startIndex] ?? '';
    const startTime = cellToSeconds(startCell, effective);

    if (isNaN(startTime)) {
      throw new SubtitleParseError(`CSV row ${rowNumber}: invalid start time "${startCell}"`);
    }

    let endTime = endIndex === null ? NaN : cellToSeconds(row[endIndex] ?? '', effective);
    if (isNaN(endTime) || endTime <= startTime) {
      endTime = startTime + DEFAULT_CSV_LINE_DURATION;
    }

    entries.push({
      index: entries.length + 1,
      startTime,
      endTime,
      text: (row[textIndex] ?? '').trim(),
    });
  });

  return entries;
}
