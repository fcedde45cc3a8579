import type { StyleSettings } from '../api';

/** Drop shadow offset used by the sample, in px */
export const SHADOW_OFFSET = 2;

/** How long each line stays in the cycling sample, in ms */
export const PREVIEW_LINE_INTERVAL = 1500;

export const PREVIEW_PLACEHOLDER = 'No subtitle preview';

export interface PreviewTextStyle {
  color: string;
  fontFamily: string;
  fontSize: string;
  fontWeight: 'bold' | 'normal';
  textShadow: string;
  paddingBottom: string;
}

/**
 * CSS text-shadow drawing the outline as a ring of offset copies,
 * with the drop shadow underneath
 */
export function buildTextShadow(style: StyleSettings): string {
  const shadows: string[] = [];
  const width = Math.max(0, Math.round(style.outlineWidth));

  for (let dx = -width; dx <= width; dx++) {
    for (let dy = -width; dy <= width; dy++) {
      if (dx === 0 && dy === 0) continue;
      shadows.push(`${dx}px ${dy}px 0 ${style.outlineColor}`);
    }
  }
  if (style.shadow) {
    shadows.push(`${SHADOW_OFFSET}px ${SHADOW_OFFSET}px 0 rgba(0, 0, 0, 0.6)`);
  }

  return shadows.length > 0 ? shadows.join(', ') : 'none';
}

export function previewTextStyle(style: StyleSettings): PreviewTextStyle {
  return {
    color: style.fontColor,
    fontFamily: `'${style.fontFamily}', sans-serif`,
    fontSize: `${style.fontSize}px`,
    fontWeight: style.bold ? 'bold' : 'normal',
    textShadow: buildTextShadow(style),
    paddingBottom: `${style.marginV}px`,
  };
}

/**
 * Lines shown by the sample; the placeholder when there are none
 */
export function previewLines(lines: string[]): string[] {
  const visible = lines.filter((line) => line.trim() !== '');
  return visible.length > 0 ? visible : [PREVIEW_PLACEHOLDER];
}

export function nextPreviewIndex(index: number, count: number): number {
  return count > 0 ? (index + 1) % count : 0;
}
