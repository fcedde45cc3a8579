import { AppSettings, CsvMapping, StyleSettings } from './types';

export const DEFAULT_STYLE: Readonly<StyleSettings> = Object.freeze({
  fontFamily: 'Arial',
  fontSize: 32,
  fontColor: '#ffffff',
  outlineColor: '#000000',
  outlineWidth: 2,
  bold: false,
  shadow: true,
  marginV: 10,
});

export const DEFAULT_CRF = 23;
export const DEFAULT_PRESET = 'veryfast';

/** Seconds a CSV subtitle stays on screen when it has no usable end time */
export const DEFAULT_CSV_LINE_DURATION = 3;

export const DEFAULT_CSV_MAPPING: Readonly<CsvMapping> = Object.freeze({
  startColumn: 0,
  endColumn: 1,
  textColumn: 2,
  timeUnit: 'seconds',
  fps: 30,
});

/**
 * Returns a fresh, mutable copy of the default settings
 */
export function createDefaultSettings(): AppSettings {
  return {
    font: { ...DEFAULT_STYLE },
    crf: DEFAULT_CRF,
    preset: DEFAULT_PRESET,
    outputDir: '',
    csvMappings: {},
  };
}
