import { StyleValidationError } from '../errors';
import { createDefaultSettings, DEFAULT_CSV_MAPPING } from './defaults';
import {
  AppSettings,
  CsvColumnRef,
  CsvMapping,
  ENCODER_PRESETS,
  EncoderPreset,
  EncoderSettings,
  StyleOverrides,
  StyleSettings,
} from './types';

const HEX_COLOR_PATTERN = /^#?([0-9a-fA-F]{6})$/;

// Characters libass would read as separators inside the force_style list
const FORBIDDEN_FONT_CHARS = /[',:\\]/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEncoderPreset(value: unknown): value is EncoderPreset {
  return typeof value === 'string' && ENCODER_PRESETS.some((preset) => preset === value);
}

/**
 * Normalizes "#RRGGBB" / "rrggbb" to lowercase "#rrggbb"
 * @throws StyleValidationError when the value is not a 6-digit hex colour
 */
export function normalizeHexColor(value: string, field: string = 'color'): string {
  const match = value.trim().match(HEX_COLOR_PATTERN);
  if (!match?.[1]) {
    throw new StyleValidationError(field, `"${value}" is not a hex colour like #ffcc00`);
  }
  return `#${match[1].toLowerCase()}`;
}

/**
 * Checks a complete style record and returns it with normalized colours
 */
export function validateStyle(style: StyleSettings): StyleSettings {
  const fontFamily = style.fontFamily.trim();
  if (!fontFamily) {
    throw new StyleValidationError('font family', 'must not be empty');
  }
  if (FORBIDDEN_FONT_CHARS.test(fontFamily)) {
    throw new StyleValidationError('font family', `"${fontFamily}" contains ' , : or \\`);
  }
  if (!Number.isInteger(style.fontSize) || style.fontSize <= 0) {
    throw new StyleValidationError('font size', `${style.fontSize} must be a positive integer`);
  }
  if (!Number.isFinite(style.outlineWidth) || style.outlineWidth < 0) {
    throw new StyleValidationError('outline width', `${style.outlineWidth} must be 0 or more`);
  }
  if (!Number.isInteger(style.marginV) || style.marginV < 0) {
    throw new StyleValidationError('bottom margin', `${style.marginV} must be 0 or more`);
  }

  return {
    ...style,
    fontFamily,
    fontColor: normalizeHexColor(style.fontColor, 'font color'),
    outlineColor: normalizeHexColor(style.outlineColor, 'outline color'),
  };
}

export function validateEncoder(encoder: EncoderSettings): EncoderSettings {
  if (!Number.isInteger(encoder.crf) || encoder.crf < 0 || encoder.crf > 51) {
    throw new StyleValidationError('CRF', `${encoder.crf} must be an integer between 0 and 51`);
  }
  if (!isEncoderPreset(encoder.preset)) {
    throw new StyleValidationError(
      'preset',
      `"${String(encoder.preset)}" is not one of ${ENCODER_PRESETS.join(', ')}`
    );
  }
  return encoder;
}

/**
 * Returns a new style with the defined override fields applied.
 * Neither `base` nor any stored settings are modified.
 */
export function applyStyleOverrides(base: StyleSettings, overrides?: StyleOverrides): StyleSettings {
  const result: StyleSettings = { ...base };
  if (!overrides) return result;

  if (overrides.fontFamily !== undefined) result.fontFamily = overrides.fontFamily;
  if (overrides.fontSize !== undefined) result.fontSize = overrides.fontSize;
  if (overrides.fontColor !== undefined) result.fontColor = overrides.fontColor;
  if (overrides.outlineColor !== undefined) result.outlineColor = overrides.outlineColor;
  if (overrides.outlineWidth !== undefined) result.outlineWidth = overrides.outlineWidth;
  if (overrides.bold !== undefined) result.bold = overrides.bold;
  if (overrides.shadow !== undefined) result.shadow = overrides.shadow;
  if (overrides.marginV !== undefined) result.marginV = overrides.marginV;

  return result;
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function isColumnRef(value: unknown): value is CsvColumnRef {
  return typeof value === 'string' || (typeof value === 'number' && Number.isInteger(value));
}

/**
 * Reads a CSV mapping from untrusted JSON, or null when it is unusable
 */
export function readCsvMapping(value: unknown): CsvMapping | null {
  if (!isRecord(value)) return null;
  const { startColumn, endColumn, textColumn } = value;
  if (!isColumnRef(startColumn) || !isColumnRef(textColumn)) return null;

  return {
    startColumn,
    endColumn: isColumnRef(endColumn) ? endColumn : null,
    textColumn,
    timeUnit: value.timeUnit === 'frames' ? 'frames' : 'seconds',
    fps: pickNumber(value, 'fps', DEFAULT_CSV_MAPPING.fps),
  };
}

/**
 * Reads partial style fields from untrusted JSON (request bodies, settings files)
 */
export function readStyleOverrides(value: unknown): StyleOverrides {
  if (!isRecord(value)) return {};
  const overrides: StyleOverrides = {};

  if (typeof value.fontFamily === 'string') overrides.fontFamily = value.fontFamily;
  if (typeof value.fontSize === 'number') overrides.fontSize = value.fontSize;
  if (typeof value.fontColor === 'string') overrides.fontColor = value.fontColor;
  if (typeof value.outlineColor === 'string') overrides.outlineColor = value.outlineColor;
  if (typeof value.outlineWidth === 'number') overrides.outlineWidth = value.outlineWidth;
  if (typeof value.bold === 'boolean') overrides.bold = value.bold;
  if (typeof value.shadow === 'boolean') overrides.shadow = value.shadow;
  if (typeof value.marginV === 'number') overrides.marginV = value.marginV;

  return overrides;
}

/**
 * Builds complete settings from parsed JSON, filling anything missing or
 * mistyped from the defaults
 */
export function mergeWithDefaults(raw: unknown): AppSettings {
  const defaults = createDefaultSettings();
  if (!isRecord(raw)) return defaults;

  const csvMappings: Record<string, CsvMapping> = {};
  if (isRecord(raw.csvMappings)) {
    for (const [filePath, value] of Object.entries(raw.csvMappings)) {
      const mapping = readCsvMapping(value);
      if (mapping) csvMappings[filePath] = mapping;
    }
  }

  const preset = raw.preset;

  return {
    font: applyStyleOverrides(defaults.font, readStyleOverrides(raw.font)),
    crf: pickNumber(raw, 'crf', defaults.crf),
    preset: isEncoderPreset(preset) ? preset : defaults.preset,
    outputDir: pickString(raw, 'outputDir', defaults.outputDir),
    csvMappings,
  };
}
