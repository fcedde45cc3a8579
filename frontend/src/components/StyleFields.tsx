import type { StyleSettings } from '../api';

interface StyleFieldsProps {
  style: StyleSettings;
  onChange: (change: Partial<StyleSettings>) => void;
}

function toNumber(value: string, fallback: number): number {
  const parsed = Number(value);
  return value.trim() === '' || isNaN(parsed) ? fallback : parsed;
}

/**
 * Font, outline, shadow and margin inputs shared by the job wizard and the settings page
 */
export function StyleFields({ style, onChange }: StyleFieldsProps) {
  return (
    <>
      <div className="form-row">
        <div className="form-group">
          <label htmlFor="fontFamily">Font</label>
          <input
            type="text"
            id="fontFamily"
            value={style.fontFamily}
            onChange={(e) => onChange({ fontFamily: e.target.value })}
            placeholder="e.g., Noto Sans"
          />
        </div>

        <div className="form-group">
          <label htmlFor="fontSize">Size (px)</label>
          <input
            type="number"
            id="fontSize"
            value={style.fontSize}
            min={1}
            onChange={(e) => onChange({ fontSize: toNumber(e.target.value, style.fontSize) })}
          />
        </div>
      </div>

      <div className="form-row">
        <div className="form-group">
          <label htmlFor="fontColor">Text colour</label>
          <input
            type="color"
            id="fontColor"
            value={style.fontColor}
            onChange={(e) => onChange({ fontColor: e.target.value })}
          />
        </div>

        <div className="form-group">
          <label htmlFor="outlineColor">Outline colour</label>
          <input
            type="color"
            id="outlineColor"
            value={style.outlineColor}
            onChange={(e) => onChange({ outlineColor: e.target.value })}
          />
        </div>

        <div className="form-group">
          <label htmlFor="outlineWidth">Outline (px)</label>
          <input
            type="number"
            id="outlineWidth"
            value={style.outlineWidth}
            min={0}
            onChange={(e) => onChange({ outlineWidth: toNumber(e.target.value, style.outlineWidth) })}
          />
        </div>
      </div>

      <div className="form-row">
        <div className="form-group">
          <label htmlFor="marginV">Bottom margin (px)</label>
          <input
            type="number"
            id="marginV"
            value={style.marginV}
            min={0}
            onChange={(e) => onChange({ marginV: toNumber(e.target.value, style.marginV) })}
          />
        </div>

        <label className="checkbox-label">
          <input type="checkbox" checked={style.bold} onChange={(e) => onChange({ bold: e.target.checked })} />
          Bold
        </label>

        <label className="checkbox-label">
          <input
            type="checkbox"
            checked={style.shadow}
            onChange={(e) => onChange({ shadow: e.target.checked })}
          />
          Shadow
        </label>
      </div>
    </>
  );
}
