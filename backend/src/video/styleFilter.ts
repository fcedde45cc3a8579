import { StyleSettings, validateStyle } from '../settings';
import { hexToAssColor } from '../subtitles';

/**
 * Converts style settings into libass force_style syntax, e.g.
 * `FontName=Arial,FontSize=32,PrimaryColour=&H00FFFFFF,OutlineColour=&H00000000,Outline=2,Shadow=1,MarginV=10`
 * @throws StyleValidationError when the style has an invalid value
 */
export function buildForceStyle(style: StyleSettings): string {
  const valid = validateStyle(style);
  const parts = [
    `FontName=${valid.fontFamily}`,
    `FontSize=${valid.fontSize}`,
    `PrimaryColour=${hexToAssColor(valid.fontColor)}`,
    `OutlineColour=${hexToAssColor(valid.outlineColor)}`,
  ];

  if (valid.outlineWidth > 0) {
    parts.push(`Outline=${valid.outlineWidth}`);
  }
  if (valid.bold) {
    parts.push('Bold=1');
  }
  parts.push(valid.shadow ? 'Shadow=1' : 'Shadow=0');
  if (valid.marginV > 0) {
    parts.push(`MarginV=${valid.marginV}`);
  }

  return parts.join(',');
}

/** Characters the filter option parser splits or unquotes on */
const OPTION_SPECIAL = /[\\':]/g;
/** Characters the filter graph parser splits or unquotes on */
const GRAPH_SPECIAL = /[\\'[\],;]/g;

/**
 * Escapes one filter option value for a `-vf` argument: first for the option
 * parser, then for the filter graph parser, so ffmpeg reads back `value` exactly
 */
export function escapeFilterValue(value: string): string {
  return value.replace(OPTION_SPECIAL, '\\$&').replace(GRAPH_SPECIAL, '\\$&');
}

/**
 * Escapes a file path for the subtitles filter.
 * Windows separators become forward slashes, leaving only the drive colon to escape.
 */
export function escapeFilterPath(filePath: string): string {
  return escapeFilterValue(filePath.replace(/\\/g, '/'));
}

/**
 * Builds the `subtitles` video filter that burns `subtitlePath` with `style`
 */
export function buildSubtitleFilter(subtitlePath: string, style: StyleSettings): string {
  return `subtitles=filename=${escapeFilterPath(subtitlePath)}:force_style=${escapeFilterValue(buildForceStyle(style))}`;
}
