import { normalizeHexColor, StyleSettings } from '../settings';
import { secondsToAssTime } from './assParser';
import { SubtitleLine } from './types';

/**
 * Converts "#rrggbb" to the ASS colour notation "&H00BBGGRR"
 */
export function hexToAssColor(hex: string): string {
  const normalized = normalizeHexColor(hex);
  const r = normalized.slice(1, 3);
  const g = normalized.slice(3, 5);
  const b = normalized.slice(5, 7);
  return `&H00${`${b}${g}${r}`.toUpperCase()}`;
}

/**
 * Escapes plain text for a Dialogue line so libass shows it as written.
 * Braces would open override blocks, and a backslash before N, n, h or a brace
 * would form an escape, so a word joiner is slipped in after it.
 */
export function escapeAssText(text: string): string {
  return text
    .replace(/\\(?=[Nnh{}])/g, '\\\u2060')
    .replace(/[{}]/g, '\\$&')
    .replace(/\r?\n/g, '\\N');
}

/**
 * Formats one Dialogue event on the Default style
 */
export function assDialogueLine(line: SubtitleLine): string {
  const start = secondsToAssTime(line.startTime);
  const end = secondsToAssTime(line.endTime);
  const text = escapeAssText(line.text);
  return `Dialogue: 0,${start},${end},Default,,0,0,0,,${text}`;
}

function assStyleLine(style: StyleSettings): string {
  const fields = [
    'Default',
    style.fontFamily,
    String(style.fontSize),
    hexToAssColor(style.fontColor),
    '&H000000FF',
    hexToAssColor(style.outlineColor),
    '&H00000000',
    style.bold ? '-1' : '0',
    '0',
    '0',
    '0',
    '100',
    '100',
    '0',
    '0',
    '1',
    String(style.outlineWidth),
    style.shadow ? '3' : '0',
    '2',
    '10',
    '10',
    String(style.marginV),
    '1',
  ];
  return `Style: ${fields.join(',')}`;
}

/**
 * Builds a complete ASS script for the lines, styled with `style`.
 * Used to burn CSV subtitles, which ffmpeg cannot read directly.
 */
export function buildAssDocument(lines: SubtitleLine[], style: StyleSettings): string {
  const header = [
    '[Script Info]',
    'ScriptType: v4.00+',
    'PlayResX: 1920',
    'PlayResY: 1080',
    'WrapStyle: 0',
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, ' +
      'BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, ' +
      'BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
    assStyleLine(style),
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
  ];

  return [...header, ...lines.map(assDialogueLine)].join('\n') + '\n';
}
