import { useEffect, useState } from 'react';
import { useNavigate } from 'react-router-dom';
import {
  createJob,
  CsvMapping,
  EncoderPreset,
  ENCODER_PRESETS,
  getCsvColumns,
  getErrorMessage,
  getSettings,
  isEncoderPreset,
  JobConfig,
  matchSubtitle,
  previewSubtitles,
  saveCsvMapping,
  startJob,
  StyleSettings,
  SubtitlePreview,
  SubtitleSource,
  updateJobConfig,
  uploadSubtitle,
  uploadVideo,
} from '../api';
import { StyleFields } from '../components/StyleFields';
import { StylePreview } from '../components/StylePreview';
import {
  columnIndex,
  columnLabel,
  SUBTITLE_ACCEPT,
  subtitleFormatOf,
  VIDEO_ACCEPT,
} from '../utils/csvColumns';
import { formatTimestamp } from '../utils/format';
import { diffStyle } from '../utils/styleOverrides';
import './CreateJob.css';

type Step = 'source' | 'csv' | 'style' | 'review';
type FileMode = 'upload' | 'path';

const STEPS: { id: Step; label: string }[] = [
  { id: 'source', label: 'Choose Files' },
  { id: 'csv', label: 'CSV Columns' },
  { id: 'style', label: 'Style' },
  { id: 'review', label: 'Review & Start' },
];

function FileModeToggle({ mode, onChange }: { mode: FileMode; onChange: (mode: FileMode) => void }) {
  return (
    <div className="mode-selector">
      <button
        type="button"
        className={`mode-option ${mode === 'upload' ? 'selected' : ''}`}
        onClick={() => onChange('upload')}
      >
        Upload
      </button>
      <button
        type="button"
        className={`mode-option ${mode === 'path' ? 'selected' : ''}`}
        onClick={() => onChange('path')}
      >
        Server path
      </button>
    </div>
  );
}

export function CreateJob() {
  const navigate = useNavigate();
  const [step, setStep] = useState<Step>('source');
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [jobId, setJobId] = useState<string | null>(null);

  // Files
  const [name, setName] = useState('');
  const [videoMode, setVideoMode] = useState<FileMode>('upload');
  const [videoPath, setVideoPath] = useState('');
  const [videoFile, setVideoFile] = useState<File | null>(null);
  const [subtitleMode, setSubtitleMode] = useState<FileMode>('upload');
  const [subtitlePath, setSubtitlePath] = useState('');
  const [subtitleFile, setSubtitleFile] = useState<File | null>(null);
  const [subtitleSuggested, setSubtitleSuggested] = useState(false);

  // CSV
  const [csvColumns, setCsvColumns] = useState<string[]>([]);
  const [csvMapping, setCsvMapping] = useState<CsvMapping | null>(null);
  const [rememberMapping, setRememberMapping] = useState(true);

  // Style and encoder, prefilled from the saved settings
  const [savedStyle, setSavedStyle] = useState<StyleSettings | null>(null);
  const [style, setStyle] = useState<StyleSettings | null>(null);
  const [crf, setCrf] = useState(23);
  const [preset, setPreset] = useState<EncoderPreset>('veryfast');
  const [codecCopy, setCodecCopy] = useState(true);
  const [outputPath, setOutputPath] = useState('');

  const [preview, setPreview] = useState<SubtitlePreview | null>(null);

  useEffect(() => {
    getSettings()
      .then(({ settings }) => {
        setSavedStyle(settings.font);
        setStyle(settings.font);
        setCrf(settings.crf);
        setPreset(settings.preset);
      })
      .catch((err: unknown) => {
        setError(getErrorMessage(err, 'Failed to load settings'));
        console.error(err);
      });
  }, []);

  const subtitleName = subtitleMode === 'path' ? subtitlePath.trim() : (subtitleFile?.name ?? '');
  const format = subtitleFormatOf(subtitleName);
  const steps = format === 'csv' ? STEPS : STEPS.filter((s) => s.id !== 'csv');
  const stepIndex = steps.findIndex((s) => s.id === step);

  const subtitleSource = (id: string): SubtitleSource =>
    subtitleMode === 'path' ? { path: subtitlePath.trim() } : { jobId: id };

  const loadPreview = async (id: string, mapping: CsvMapping | null) => {
    const data = await previewSubtitles(subtitleSource(id), mapping);
    setPreview(data);
  };

  // Fill in the same-named subtitle beside a server-side video
  const suggestSubtitle = async () => {
    if (videoMode !== 'path' || !videoPath.trim() || subtitleName) return;

    try {
      const found = await matchSubtitle(videoPath.trim());
      if (found) {
        setSubtitleMode('path');
        setSubtitlePath(found);
        setSubtitleSuggested(true);
      }
    } catch (err) {
      console.error(err);
    }
  };

  const handleSource = async () => {
    if (videoMode === 'path' ? !videoPath.trim() : !videoFile) {
      setError('Choose a video');
      return;
    }
    if (!subtitleName) {
      setError('Choose a subtitle file');
      return;
    }
    if (!format) {
      setError('Subtitle files must be .srt, .ass, .ssa or .csv');
      return;
    }

    setLoading(true);
    setError(null);

    try {
      const config: JobConfig = { styleOverrides: {}, codecCopy: true };
      if (name.trim()) config.name = name.trim();
      if (videoMode === 'path') config.videoPath = videoPath.trim();
      if (subtitleMode === 'path') config.subtitlePath = subtitlePath.trim();

      const id = jobId ?? (await createJob(config)).id;
      if (jobId) await updateJobConfig(id, config);
      setJobId(id);

      if (videoMode === 'upload' && videoFile) await uploadVideo(id, videoFile);
      if (subtitleMode === 'upload' && subtitleFile) await uploadSubtitle(id, subtitleFile);

      if (format === 'csv') {
        const columns = await getCsvColumns(subtitleSource(id));
        setCsvColumns(columns.columns);
        setCsvMapping(columns.mapping);
        setStep('csv');
      } else {
        await loadPreview(id, null);
        setStep('style');
      }
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to prepare the job'));
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  const handleCsv = async () => {
    if (!jobId || !csvMapping) return;

    setLoading(true);
    setError(null);

    try {
      await loadPreview(jobId, csvMapping);
      if (rememberMapping && subtitleMode === 'path') {
        await saveCsvMapping(subtitlePath.trim(), csvMapping);
      }
      setStep('style');
    } catch (err) {
      setError(getErrorMessage(err, 'The CSV file could not be read with these columns'));
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  const handleStartJob = async () => {
    if (!jobId || !style || !savedStyle) return;

    setLoading(true);
    setError(null);

    try {
      const config: JobConfig = {
        styleOverrides: diffStyle(savedStyle, style),
        crf,
        preset,
        codecCopy,
        csvMapping: format === 'csv' ? csvMapping : null,
      };
      if (name.trim()) config.name = name.trim();
      if (videoMode === 'path') config.videoPath = videoPath.trim();
      if (subtitleMode === 'path') config.subtitlePath = subtitlePath.trim();
      if (outputPath.trim()) config.outputPath = outputPath.trim();

      await updateJobConfig(jobId, config);
      await startJob(jobId);
      navigate(`/job/${jobId}`);
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to start job'));
      console.error(err);
      setLoading(false);
    }
  };

  const updateMapping = (change: Partial<CsvMapping>) => {
    setCsvMapping((current) => (current ? { ...current, ...change } : current));
  };

  const overrides = style && savedStyle ? diffStyle(savedStyle, style) : {};

  return (
    <div className="create-job-page">
      <h1 className="page-title">New Burn Job</h1>

      {/* Progress steps */}
      <div className="steps">
        {steps.map((s, index) => (
          <div
            key={s.id}
            className={`step ${s.id === step ? 'active' : index < stepIndex ? 'completed' : ''}`}
          >
            <span className="step-number">{index + 1}</span>
            <span className="step-label">{s.label}</span>
          </div>
        ))}
      </div>

      {error && <div className="error-message">{error}</div>}

      {/* Step 1: Files */}
      {step === 'source' && (
        <div className="card form-card">
          <h2>Video and Subtitles</h2>

          <div className="form-group">
            <label htmlFor="name">Name</label>
            <input
              type="text"
              id="name"
              value={name}
              onChange={(e) => setName(e.target.value)}
              placeholder="Defaults to the video file name"
            />
          </div>

          <div className="form-group">
            <label>Video *</label>
            <FileModeToggle mode={videoMode} onChange={setVideoMode} />
            {videoMode === 'upload' ? (
              <input
                type="file"
                accept={VIDEO_ACCEPT}
                onChange={(e) => setVideoFile(e.target.files?.[0] ?? null)}
                className="file-input"
              />
            ) : (
              <input
                type="text"
                value={videoPath}
                onChange={(e) => setVideoPath(e.target.value)}
                onBlur={() => void suggestSubtitle()}
                placeholder="e.g., /home/me/Videos/holiday.mp4"
              />
            )}
          </div>

          <div className="form-group">
            <label>Subtitles *</label>
            <FileModeToggle mode={subtitleMode} onChange={setSubtitleMode} />
            {subtitleMode === 'upload' ? (
              <input
                type="file"
                accept={SUBTITLE_ACCEPT}
                onChange={(e) => setSubtitleFile(e.target.files?.[0] ?? null)}
                className="file-input"
              />
            ) : (
              <input
                type="text"
                value={subtitlePath}
                onChange={(e) => {
                  setSubtitlePath(e.target.value);
                  setSubtitleSuggested(false);
                }}
                placeholder="e.g., /home/me/Videos/holiday.srt"
              />
            )}
            {subtitleMode === 'path' && subtitleSuggested && (
              <small className="form-hint">Found next to the video.</small>
            )}
            <small className="form-hint">SRT, ASS/SSA or CSV with start, end and text columns.</small>
          </div>

          <div className="form-actions">
            <button className="btn btn-primary" onClick={() => void handleSource()} disabled={loading}>
              {loading ? 'Preparing...' : 'Continue'}
            </button>
          </div>
        </div>
      )}

      {/* Step 2: CSV columns */}
      {step === 'csv' && csvMapping && (
        <div className="card form-card">
          <h2>CSV Columns</h2>

          <div className="form-row">
            <div className="form-group">
              <label htmlFor="startColumn">Start time</label>
              <select
                id="startColumn"
                value={columnIndex(csvMapping.startColumn, csvColumns)}
                onChange={(e) => updateMapping({ startColumn: Number(e.target.value) })}
              >
                {csvColumns.map((_, index) => (
                  <option key={index} value={index}>
                    {columnLabel(csvColumns, index)}
                  </option>
                ))}
              </select>
            </div>

            <div className="form-group">
              <label htmlFor="endColumn">End time</label>
              <select
                id="endColumn"
                value={columnIndex(csvMapping.endColumn, csvColumns)}
                onChange={(e) => {
                  const index = Number(e.target.value);
                  updateMapping({ endColumn: index === -1 ? null : index });
                }}
              >
                <option value={-1}>None (fixed duration)</option>
                {csvColumns.map((_, index) => (
                  <option key={index} value={index}>
                    {columnLabel(csvColumns, index)}
                  </option>
                ))}
              </select>
            </div>

            <div className="form-group">
              <label htmlFor="textColumn">Text</label>
              <select
                id="textColumn"
                value={columnIndex(csvMapping.textColumn, csvColumns)}
                onChange={(e) => updateMapping({ textColumn: Number(e.target.value) })}
              >
                {csvColumns.map((_, index) => (
                  <option key={index} value={index}>
                    {columnLabel(csvColumns, index)}
                  </option>
                ))}
              </select>
            </div>
          </div>

          <div className="form-row">
            <div className="form-group">
              <label htmlFor="timeUnit">Times are in</label>
              <select
                id="timeUnit"
                value={csvMapping.timeUnit}
                onChange={(e) => updateMapping({ timeUnit: e.target.value === 'frames' ? 'frames' : 'seconds' })}
              >
                <option value="seconds">Seconds</option>
                <option value="frames">Frames</option>
              </select>
            </div>

            {csvMapping.timeUnit === 'frames' && (
              <div className="form-group">
                <label htmlFor="fps">Frame rate</label>
                <input
                  type="number"
                  id="fps"
                  value={csvMapping.fps}
                  min={1}
                  step="0.001"
                  onChange={(e) => updateMapping({ fps: Number(e.target.value) })}
                />
              </div>
            )}
          </div>

          {subtitleMode === 'path' && (
            <label className="checkbox-label">
              <input
                type="checkbox"
                checked={rememberMapping}
                onChange={(e) => setRememberMapping(e.target.checked)}
              />
              Remember these columns for this file
            </label>
          )}

          <div className="form-actions">
            <button className="btn btn-secondary" onClick={() => setStep('source')}>
              Back
            </button>
            <button className="btn btn-primary" onClick={() => void handleCsv()} disabled={loading}>
              {loading ? 'Reading...' : 'Continue'}
            </button>
          </div>
        </div>
      )}

      {/* Step 3: Style and encoder */}
      {step === 'style' && style && (
        <div className="card form-card">
          <h2>Style for this Job</h2>
          <p className="upload-description">
            Prefilled from your saved settings. Changes here only apply to this job.
          </p>

          <StylePreview style={style} lines={(preview?.lines ?? []).slice(0, 10).map((line) => line.text)} />

          <StyleFields style={style} onChange={(change) => setStyle({ ...style, ...change })} />

          <h3>Encoder</h3>
          <div className="form-row">
            <div className="form-group">
              <label htmlFor="crf">CRF</label>
              <input
                type="number"
                id="crf"
                value={crf}
                min={0}
                max={51}
                onChange={(e) => setCrf(Number(e.target.value))}
              />
            </div>

            <div className="form-group">
              <label htmlFor="preset">Preset</label>
              <select
                id="preset"
                value={preset}
                onChange={(e) => {
                  if (isEncoderPreset(e.target.value)) setPreset(e.target.value);
                }}
              >
                {ENCODER_PRESETS.map((p) => (
                  <option key={p} value={p}>
                    {p}
                  </option>
                ))}
              </select>
            </div>

            <label className="checkbox-label">
              <input type="checkbox" checked={codecCopy} onChange={(e) => setCodecCopy(e.target.checked)} />
              Copy streams when nothing is burned
            </label>
          </div>

          <div className="form-group">
            <label htmlFor="outputPath">Output file</label>
            <input
              type="text"
              id="outputPath"
              value={outputPath}
              onChange={(e) => setOutputPath(e.target.value)}
              placeholder="Defaults to <name>_sub next to the video or in the output folder"
            />
          </div>

          <div className="form-actions">
            <button className="btn btn-secondary" onClick={() => setStep(format === 'csv' ? 'csv' : 'source')}>
              Back
            </button>
            <button className="btn btn-primary" onClick={() => setStep('review')}>
              Continue
            </button>
          </div>
        </div>
      )}

      {/* Step 4: Review & Start */}
      {step === 'review' && (
        <div className="card form-card">
          <h2>Review & Start</h2>

          <div className="review-summary">
            <div className="review-item">
              <span className="review-label">Video:</span>
              <span className="review-value">{videoMode === 'path' ? videoPath : videoFile?.name}</span>
            </div>
            <div className="review-item">
              <span className="review-label">Subtitles:</span>
              <span className="review-value">
                {subtitleName}
                {preview && ` (${preview.lineCount} lines, ${preview.format.toUpperCase()})`}
              </span>
            </div>
            <div className="review-item">
              <span className="review-label">Style overrides:</span>
              <span className="review-value">
                {Object.keys(overrides).length > 0
                  ? Object.entries(overrides)
                      .map(([key, value]) => `${key}=${String(value)}`)
                      .join(', ')
                  : 'None, saved style'}
              </span>
            </div>
            <div className="review-item">
              <span className="review-label">Encoder:</span>
              <span className="review-value">
                libx264, CRF {crf}, {preset}
              </span>
            </div>
          </div>

          {preview && preview.lines.length > 0 && (
            <table className="preview-table">
              <thead>
                <tr>
                  <th>#</th>
                  <th>Start</th>
                  <th>End</th>
                  <th>Text</th>
                </tr>
              </thead>
              <tbody>
                {preview.lines.slice(0, 10).map((line) => (
                  <tr key={line.index}>
                    <td>{line.index}</td>
                    <td>{formatTimestamp(line.startTime)}</td>
                    <td>{formatTimestamp(line.endTime)}</td>
                    <td>{line.text}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          )}

          <div className="form-actions">
            <button className="btn btn-secondary" onClick={() => setStep('style')}>
              Back
            </button>
            <button className="btn btn-primary" onClick={() => void handleStartJob()} disabled={loading}>
              {loading ? 'Starting...' : '🔥 Burn Subtitles'}
            </button>
          </div>
        </div>
      )}
    </div>
  );
}
