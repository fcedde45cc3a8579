import { describe, it, expect } from 'vitest';
import { DEFAULT_STYLE } from './defaults';
import {
  applyStyleOverrides,
  normalizeHexColor,
  readCsvMapping,
  validateEncoder,
  validateStyle,
} from './validation';

describe('normalizeHexColor', () => {
  it('should accept #rrggbb and rrggbb', () => {
    expect(normalizeHexColor('#FFcc00')).toBe('#ffcc00');
    expect(normalizeHexColor(' 00ff00 ')).toBe('#00ff00');
  });

  it('should name the field in the error', () => {
    expect(() => normalizeHexColor('#ggg000', 'font color')).toThrow(
      'Invalid font color: "#ggg000" is not a hex colour like #ffcc00'
    );
  });
});

describe('validateStyle', () => {
  it('should return the style with normalized colours', () => {
    expect(validateStyle({ ...DEFAULT_STYLE, fontFamily: ' Verdana ', outlineColor: '123ABC' })).toEqual({
      ...DEFAULT_STYLE,
      fontFamily: 'Verdana',
      outlineColor: '#123abc',
    });
  });

  it('should reject each invalid field', () => {
    expect(() => validateStyle({ ...DEFAULT_STYLE, fontFamily: '  ' })).toThrow(
      'Invalid font family: must not be empty'
    );
    expect(() => validateStyle({ ...DEFAULT_STYLE, fontFamily: "Bob's Font" })).toThrow(
      'Invalid font family'
    );
    expect(() => validateStyle({ ...DEFAULT_STYLE, fontSize: 0 })).toThrow(
      'Invalid font size: 0 must be a positive integer'
    );
    expect(() => validateStyle({ ...DEFAULT_STYLE, fontSize: 12.5 })).toThrow('Invalid font size');
    expect(() => validateStyle({ ...DEFAULT_STYLE, outlineWidth: -1 })).toThrow(
      'Invalid outline width: -1 must be 0 or more'
    );
    expect(() => validateStyle({ ...DEFAULT_STYLE, marginV: -5 })).toThrow('Invalid bottom margin');
    expect(() => validateStyle({ ...DEFAULT_STYLE, fontColor: 'white' })).toThrow('Invalid font color');
  });

  it('should allow a zero outline width', () => {
    expect(validateStyle({ ...DEFAULT_STYLE, outlineWidth: 0 }).outlineWidth).toBe(0);
  });
});

describe('validateEncoder', () => {
  it('should accept the CRF bounds', () => {
    expect(validateEncoder({ crf: 0, preset: 'ultrafast' })).toEqual({ crf: 0, preset: 'ultrafast' });
    expect(validateEncoder({ crf: 51, preset: 'veryslow' })).toEqual({ crf: 51, preset: 'veryslow' });
  });

  it('should reject out of range CRF', () => {
    expect(() => validateEncoder({ crf: -1, preset: 'fast' })).toThrow('Invalid CRF');
  });
});

describe('applyStyleOverrides', () => {
  it('should return a new record and leave the base untouched', () => {
    const base = { ...DEFAULT_STYLE };
    const result = applyStyleOverrides(base, { fontSize: 40, bold: true, shadow: undefined });

    expect(result).toEqual({ ...DEFAULT_STYLE, fontSize: 40, bold: true });
    expect(base).toEqual(DEFAULT_STYLE);
    expect(result).not.toBe(base);
  });
});

describe('readCsvMapping', () => {
  it('should read a stored mapping', () => {
    expect(readCsvMapping({ startColumn: 'a', textColumn: 2, timeUnit: 'frames', fps: 24 })).toEqual({
      startColumn: 'a',
      endColumn: null,
      textColumn: 2,
      timeUnit: 'frames',
      fps: 24,
    });
  });

  it('should return null for unusable values', () => {
    expect(readCsvMapping({ startColumn: true, textColumn: 1 })).toBeNull();
    expect(readCsvMapping('nope')).toBeNull();
  });
});
