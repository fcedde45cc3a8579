import { useEffect, useState } from 'react';
import {
  AppSettings,
  ENCODER_PRESETS,
  getErrorMessage,
  getHealth,
  getSettings,
  HealthStatus,
  isEncoderPreset,
  resetSettings,
  updateSettings,
} from '../api';
import { StyleFields } from '../components/StyleFields';
import { StylePreview } from '../components/StylePreview';
import './StyleSettings.css';

const SAMPLE_LINES = ['The quick brown fox', 'jumps over the lazy dog'];

export function StyleSettings() {
  const [settings, setSettings] = useState<AppSettings | null>(null);
  const [health, setHealth] = useState<HealthStatus | null>(null);
  const [saving, setSaving] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [message, setMessage] = useState<string | null>(null);

  useEffect(() => {
    getSettings()
      .then((data) => setSettings(data.settings))
      .catch((err: unknown) => {
        setError(getErrorMessage(err, 'Failed to load settings'));
        console.error(err);
      });
    getHealth()
      .then(setHealth)
      .catch((err: unknown) => console.error(err));
  }, []);

  const handleSave = async () => {
    if (!settings) return;

    setSaving(true);
    setError(null);
    setMessage(null);

    try {
      const saved = await updateSettings({
        font: settings.font,
        crf: settings.crf,
        preset: settings.preset,
        outputDir: settings.outputDir,
      });
      setSettings(saved);
      setMessage('Settings saved');
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to save settings'));
      console.error(err);
    } finally {
      setSaving(false);
    }
  };

  const handleReset = async () => {
    if (!confirm('Restore the default style and encoder settings?')) return;

    try {
      setSettings(await resetSettings());
      setMessage('Defaults restored');
      setError(null);
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to reset settings'));
      console.error(err);
    }
  };

  if (!settings) {
    return error ? <div className="error-message">{error}</div> : <div className="loading">Loading settings...</div>;
  }

  return (
    <div className="style-settings-page">
      <h1 className="page-title">Style Settings</h1>

      {health && !health.services.ffmpeg.available && (
        <div className="error-message">
          FFmpeg was not found at "{health.services.ffmpeg.path}". Install FFmpeg or set FFMPEG_PATH.
        </div>
      )}
      {error && <div className="error-message">{error}</div>}
      {message && <div className="success-message">{message}</div>}

      <div className="card form-card">
        <h2>Subtitle Style</h2>
        <StylePreview style={settings.font} lines={SAMPLE_LINES} />
        <StyleFields
          style={settings.font}
          onChange={(change) => setSettings({ ...settings, font: { ...settings.font, ...change } })}
        />
      </div>

      <div className="card form-card">
        <h2>Output</h2>
        <div className="form-row">
          <div className="form-group">
            <label htmlFor="crf">CRF</label>
            <input
              type="number"
              id="crf"
              value={settings.crf}
              min={0}
              max={51}
              onChange={(e) => setSettings({ ...settings, crf: Number(e.target.value) })}
            />
            <small className="form-hint">Lower is better quality and larger files. 23 is a good default.</small>
          </div>

          <div className="form-group">
            <label htmlFor="preset">Preset</label>
            <select
              id="preset"
              value={settings.preset}
              onChange={(e) => {
                const preset = e.target.value;
                if (isEncoderPreset(preset)) setSettings({ ...settings, preset });
              }}
            >
              {ENCODER_PRESETS.map((p) => (
                <option key={p} value={p}>
                  {p}
                </option>
              ))}
            </select>
          </div>
        </div>

        <div className="form-group">
          <label htmlFor="outputDir">Output folder</label>
          <input
            type="text"
            id="outputDir"
            value={settings.outputDir}
            onChange={(e) => setSettings({ ...settings, outputDir: e.target.value })}
            placeholder="Empty: an output folder next to each video"
          />
        </div>
      </div>

      {health && (
        <p className="settings-path">
          Saved to {health.config.settingsPath}
          {health.services.ffmpeg.version && ` · ${health.services.ffmpeg.version}`}
        </p>
      )}

      <div className="form-actions">
        <button className="btn btn-secondary" onClick={() => void handleReset()}>
          Reset to Defaults
        </button>
        <button className="btn btn-primary" onClick={() => void handleSave()} disabled={saving}>
          {saving ? 'Saving...' : 'Save Settings'}
        </button>
      </div>
    </div>
  );
}
