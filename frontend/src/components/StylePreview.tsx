import { useEffect, useState } from 'react';
import type { StyleSettings } from '../api';
import { nextPreviewIndex, PREVIEW_LINE_INTERVAL, previewLines, previewTextStyle } from '../utils/stylePreview';
import './StylePreview.css';

interface StylePreviewProps {
  style: StyleSettings;
  /** Sample lines, shown one after another */
  lines: string[];
}

/**
 * Approximation of the burned subtitle on a black frame
 */
export function StylePreview({ style, lines }: StylePreviewProps) {
  const [index, setIndex] = useState(0);
  const visible = previewLines(lines);

  useEffect(() => {
    setIndex(0);
    if (visible.length < 2) return;

    const interval = setInterval(() => {
      setIndex((current) => nextPreviewIndex(current, visible.length));
    }, PREVIEW_LINE_INTERVAL);
    return () => clearInterval(interval);
  }, [visible.join('\n')]);

  return (
    <div className="style-preview">
      <p className="style-preview-text" style={previewTextStyle(style)}>
        {visible[index] ?? visible[0]}
      </p>
    </div>
  );
}
