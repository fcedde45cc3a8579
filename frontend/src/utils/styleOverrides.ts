import type { StyleOverrides, StyleSettings } from '../api';

const STYLE_KEYS = [
  'fontFamily',
  'fontSize',
  'fontColor',
  'outlineColor',
  'outlineWidth',
  'bold',
  'shadow',
  'marginV',
] as const;

/**
 * Fields of `edited` that differ from the saved style, sent as per-run overrides
 */
export function diffStyle(saved: StyleSettings, edited: StyleSettings): StyleOverrides {
  const overrides: StyleOverrides = {};
  for (const key of STYLE_KEYS) {
    if (saved[key] !== edited[key]) {
      Object.assign(overrides, { [key]: edited[key] });
    }
  }
  return overrides;
}

export function applyOverrides(saved: StyleSettings, overrides: StyleOverrides): StyleSettings {
  const result: StyleSettings = { ...saved };
  for (const key of STYLE_KEYS) {
    if (overrides[key] !== undefined) {
      Object.assign(result, { [key]: overrides[key] });
    }
  }
  return result;
}
