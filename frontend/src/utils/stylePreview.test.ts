import { describe, it, expect } from 'vitest';
import type { StyleSettings } from '../api';
import {
  buildTextShadow,
  nextPreviewIndex,
  PREVIEW_PLACEHOLDER,
  previewLines,
  previewTextStyle,
} from './stylePreview';

const style: StyleSettings = {
  fontFamily: 'Arial',
  fontSize: 32,
  fontColor: '#ffcc00',
  outlineColor: '#000000',
  outlineWidth: 1,
  bold: true,
  shadow: true,
  marginV: 10,
};

describe('buildTextShadow', () => {
  it('should ring the text with the outline colour and add the shadow last', () => {
    expect(buildTextShadow(style)).toBe(
      [
        '-1px -1px 0 #000000',
        '-1px 0px 0 #000000',
        '-1px 1px 0 #000000',
        '0px -1px 0 #000000',
        '0px 1px 0 #000000',
        '1px -1px 0 #000000',
        '1px 0px 0 #000000',
        '1px 1px 0 #000000',
        '2px 2px 0 rgba(0, 0, 0, 0.6)',
      ].join(', ')
    );
  });

  it('should be none without outline and shadow', () => {
    expect(buildTextShadow({ ...style, outlineWidth: 0, shadow: false })).toBe('none');
  });

  it('should draw 24 outline copies for a width of 2', () => {
    expect(buildTextShadow({ ...style, outlineWidth: 2, shadow: false }).split(', ')).toHaveLength(24);
  });
});

describe('previewTextStyle', () => {
  it('should map the style to CSS values', () => {
    expect(previewTextStyle({ ...style, outlineWidth: 0, shadow: false })).toEqual({
      color: '#ffcc00',
      fontFamily: "'Arial', sans-serif",
      fontSize: '32px',
      fontWeight: 'bold',
      textShadow: 'none',
      paddingBottom: '10px',
    });
  });
});

describe('previewLines', () => {
  it('should drop blank lines and fall back to the placeholder', () => {
    expect(previewLines(['Hello', ' ', 'World'])).toEqual(['Hello', 'World']);
    expect(previewLines([])).toEqual([PREVIEW_PLACEHOLDER]);
  });
});

describe('nextPreviewIndex', () => {
  it('should wrap around', () => {
    expect(nextPreviewIndex(0, 3)).toBe(1);
    expect(nextPreviewIndex(2, 3)).toBe(0);
    expect(nextPreviewIndex(4, 0)).toBe(0);
  });
});
