/**
 * Subtitle appearance applied through ffmpeg's force_style
 */
export interface StyleSettings {
  fontFamily: string;
  /** Font size in pixels */
  fontSize: number;
  /** Text colour as #rrggbb */
  fontColor: string;
  /** Outline colour as #rrggbb */
  outlineColor: string;
  /** Outline width in pixels, 0 disables the outline */
  outlineWidth: number;
  bold: boolean;
  shadow: boolean;
  /** Bottom margin in pixels */
  marginV: number;
}

/**
 * Per-run style overrides, never persisted
 */
export type StyleOverrides = Partial<StyleSettings>;

export const ENCODER_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;

export type EncoderPreset = (typeof ENCODER_PRESETS)[number];

export type CsvTimeUnit = 'seconds' | 'frames';

/**
 * Column reference in a CSV subtitle file: a header name or a 0-based index
 */
export type CsvColumnRef = string | number;

/**
 * Which CSV columns carry start time, end time and text
 */
export interface CsvMapping {
  startColumn: CsvColumnRef;
  endColumn?: CsvColumnRef | null;
  textColumn: CsvColumnRef;
  timeUnit: CsvTimeUnit;
  /** Frame rate used when timeUnit is 'frames' */
  fps: number;
}

export interface EncoderSettings {
  /** Constant rate factor, 0-51 */
  crf: number;
  preset: EncoderPreset;
}

/**
 * Everything persisted in the settings file
 */
export interface AppSettings extends EncoderSettings {
  font: StyleSettings;
  /** Output folder for the GUI; empty means an `output` folder next to the video */
  outputDir: string;
  /** CSV column mappings keyed by subtitle file path */
  csvMappings: Record<string, CsvMapping>;
}

export type AppSettingsPatch = Partial<Omit<AppSettings, 'font'>> & {
  font?: StyleOverrides;
};
