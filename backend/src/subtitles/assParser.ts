import { SubtitleParseError } from '../errors';
import { SubtitleLine } from './types';

const DEFAULT_EVENT_FORMAT = [
  'layer',
  'start',
  'end',
  'style',
  'name',
  'marginl',
  'marginr',
  'marginv',
  'effect',
  'text',
];

const ASS_TIME_PATTERN = /^(\d+):(\d{1,2}):(\d{1,2})(?:[.,](\d{1,3}))?$/;

/**
 * Converts an ASS timestamp (H:MM:SS.cc) to seconds
 */
export function assTimeToSeconds(timestamp: string): number {
  const match = timestamp.trim().match(ASS_TIME_PATTERN);
  if (!match?.[1] || !match[2] || !match[3]) {
    throw new Error(`Invalid ASS timestamp format: ${timestamp}`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseInt(match[3], 10);
  const fraction = match[4] ? parseFloat(`0.${match[4]}`) : 0;

  return hours * 3600 + minutes * 60 + seconds + fraction;
}

/**
 * Converts seconds to an ASS timestamp (H:MM:SS.cc)
 */
export function secondsToAssTime(seconds: number): string {
  const totalCs = Math.max(0, Math.round(seconds * 100));
  const hours = Math.floor(totalCs / 360000);
  const minutes = Math.floor((totalCs % 360000) / 6000);
  const secs = Math.floor((totalCs % 6000) / 100);
  const cs = totalCs % 100;

  return (
    `${hours}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')}.` +
    `${cs.toString().padStart(2, '0')}`
  );
}

/**
 * Turns ASS dialogue text into plain text: override blocks removed,
 * \N and \n become line breaks, \h becomes a space
 */
export function assTextToPlain(text: string): string {
  return text
    .replace(/\{[^}]*\}/g, '')
    .replace(/\\[Nn]/g, '\n')
    .replace(/\\h/g, ' ')
    .trim();
}

/**
 * Splits a Dialogue value into its fields. The last field (Text) keeps its commas.
 */
function splitEventFields(value: string, fieldCount: number): string[] {
  const fields: string[] = [];
  let rest = value;

  for (let i = 0; i < fieldCount - 1; i++) {
    const comma = rest.indexOf(',');
    if (comma === -1) {
      break;
    }
    fields.push(rest.slice(0, comma).trim());
    rest = rest.slice(comma + 1);
  }
  fields.push(rest);

  return fields;
}

/**
 * Parses the [Events] section of an ASS/SSA script into subtitle lines
 * @param content - The raw script content
 * @returns Dialogue lines in file order
 */
export function parseAssContent(content: string): SubtitleLine[] {
  const lines = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const entries: SubtitleLine[] = [];

  let inEvents = false;
  let sawEvents = false;
  let format = DEFAULT_EVENT_FORMAT;

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (line.startsWith('[') && line.endsWith(']')) {
      inEvents = line.toLowerCase() === '[events]';
      sawEvents = sawEvents || inEvents;
      continue;
    }

    if (!inEvents) continue;

    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const key = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1);

    if (key === 'format') {
      format = value.split(',').map((field) => field.trim().toLowerCase());
      continue;
    }

    if (key !== 'dialogue') continue;

    const fields = splitEventFields(value.trimStart(), format.length);
    const startField = fields[format.indexOf('start')];
    const endField = fields[format.indexOf('end')];
    const textField = fields[format.indexOf('text')];

    if (startField === undefined || endField === undefined || textField === undefined) {
      continue;
    }

    let startTime: number;
    let endTime: number;
    try {
      startTime = assTimeToSeconds(startField);
      endTime = assTimeToSeconds(endField);
    } catch {
      continue; // Skip dialogue lines with unreadable timing
    }

    const text = assTextToPlain(textField);
    if (!text) continue;

    entries.push({
      index: entries.length + 1,
      startTime,
      endTime,
      text,
    });
  }

  if (!sawEvents) {
    throw new SubtitleParseError('ASS/SSA script has no [Events] section');
  }

  return entries;
}
