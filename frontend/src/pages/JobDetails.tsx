import { useState, useEffect, useRef } from 'react';
import { useParams, Link } from 'react-router-dom';
import {
  cancelJob,
  getDownloadUrl,
  getErrorMessage,
  getJob,
  Job,
  JobStatus,
  startJob,
} from '../api';
import { formatFileSize, formatTimestamp } from '../utils/format';
import { getStatusClass, isActive } from '../utils/jobStatus';
import './JobDetails.css';

const STAGE_LABELS: Record<JobStatus, string> = {
  pending: 'Pending',
  validating: 'Checking files and style',
  preparing: 'Reading subtitles',
  encoding: 'Burning with ffmpeg',
  completed: 'Completed',
  failed: 'Failed',
  cancelled: 'Cancelled',
};

const STAGE_ORDER: JobStatus[] = ['validating', 'preparing', 'encoding'];

function getStageIcon(stage: JobStatus, job: Job): string {
  if (job.progress.completedStages.includes(stage) || job.status === 'completed') return '✅';
  if (stage === job.progress.stage) {
    if (job.status === 'failed') return '❌';
    if (job.status === 'cancelled') return '⏹️';
    return '⏳';
  }
  return '⏹️';
}

export function JobDetails() {
  const { id } = useParams<{ id: string }>();
  const [job, setJob] = useState<Job | null>(null);
  const [queued, setQueued] = useState(false);
  const [overallProgress, setOverallProgress] = useState(0);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [showAllLines, setShowAllLines] = useState(false);
  const logsEndRef = useRef<HTMLDivElement>(null);

  const fetchJob = async () => {
    if (!id) return;

    try {
      const data = await getJob(id);
      setJob(data.job);
      setQueued(data.queued);
      setOverallProgress(data.overallProgress);
      setError(null);
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to load job details'));
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  useEffect(() => {
    void fetchJob();

    // Poll while the job waits in the queue or runs
    const interval = setInterval(() => {
      if (job && (queued || isActive(job.status))) {
        void fetchJob();
      }
    }, 1000);

    return () => clearInterval(interval);
  }, [id, job?.status, queued]);

  // Auto-scroll logs to bottom
  useEffect(() => {
    if (logsEndRef.current) {
      logsEndRef.current.scrollIntoView({ behavior: 'smooth' });
    }
  }, [job?.progress.logs?.length]);

  const handleStart = async () => {
    if (!id) return;

    try {
      await startJob(id);
      await fetchJob();
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to start job'));
      console.error(err);
    }
  };

  const handleCancel = async () => {
    if (!id) return;

    try {
      await cancelJob(id);
      await fetchJob();
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to cancel job'));
      console.error(err);
    }
  };

  if (loading) {
    return <div className="loading">Loading job details...</div>;
  }

  if (!job) {
    return (
      <div className="job-details-page">
        <div className="error-message">{error ?? 'Job not found'}</div>
        <Link to="/" className="btn btn-secondary">
          Back to Jobs
        </Link>
      </div>
    );
  }

  const isProcessing = isActive(job.status);
  const waiting = queued && job.status === 'pending';
  const previewLines = job.subtitlePreview ?? [];
  const visibleLines = showAllLines ? previewLines : previewLines.slice(0, 5);

  return (
    <div className="job-details-page">
      <div className="job-header">
        <div>
          <Link to="/" className="back-link">
            ← Back to Jobs
          </Link>
          <h1 className="page-title">{job.config.name ?? job.videoFile?.originalName ?? job.id}</h1>
        </div>
        <span className={`status-badge ${getStatusClass(job.status)}`}>
          {isProcessing && <span className="status-pulse"></span>}
          {waiting ? 'Queued' : STAGE_LABELS[job.status]}
        </span>
      </div>

      {error && <div className="error-message">{error}</div>}

      {/* Job Info */}
      <div className="card job-info">
        <h2>Files</h2>
        <div className="info-grid">
          <div className="info-item">
            <span className="info-label">Video</span>
            <span className="info-value">
              {job.config.videoPath ??
                (job.videoFile ? `${job.videoFile.originalName} (${formatFileSize(job.videoFile.size)})` : '-')}
            </span>
          </div>
          <div className="info-item">
            <span className="info-label">Subtitles</span>
            <span className="info-value">
              {job.config.subtitlePath ?? job.subtitleFile?.originalName ?? '-'}
              {job.subtitleFormat && ` (${job.subtitleFormat.toUpperCase()}, ${job.subtitleLineCount ?? 0} lines)`}
            </span>
          </div>
          <div className="info-item">
            <span className="info-label">Encoder</span>
            <span className="info-value">
              CRF {job.config.crf ?? 'saved'}, {job.config.preset ?? 'saved preset'}
            </span>
          </div>
          <div className="info-item">
            <span className="info-label">Style overrides</span>
            <span className="info-value">
              {Object.keys(job.config.styleOverrides).length > 0
                ? Object.entries(job.config.styleOverrides)
                    .map(([key, value]) => `${key}=${String(value)}`)
                    .join(', ')
                : 'None'}
            </span>
          </div>
          {job.outputPath && (
            <div className="info-item">
              <span className="info-label">Output</span>
              <span className="info-value">{job.outputPath}</span>
            </div>
          )}
        </div>
      </div>

      {/* Progress */}
      {job.status !== 'pending' && (
        <div className="card progress-section">
          <h2>Progress</h2>

          <div className="overall-progress">
            <div className="progress-bar-container large">
              <div
                className={`progress-bar ${isProcessing ? 'animated' : ''}`}
                style={{ width: `${overallProgress}%` }}
              />
            </div>
            <span className="progress-percent">{overallProgress}%</span>
          </div>

          <p className="current-step">
            {isProcessing && <span className="pulse-dot"></span>}
            {job.progress.currentStep}
          </p>

          <div className="stages-list">
            {STAGE_ORDER.map((stage) => (
              <div
                key={stage}
                className={`stage-item ${stage === job.progress.stage ? 'current' : ''} ${job.progress.completedStages.includes(stage) ? 'completed' : ''}`}
              >
                <span className="stage-icon">{getStageIcon(stage, job)}</span>
                <span className="stage-label">{STAGE_LABELS[stage]}</span>
                {stage === job.progress.stage && isProcessing && job.progress.stageProgress > 0 && (
                  <span className="stage-progress">{job.progress.stageProgress}%</span>
                )}
              </div>
            ))}
          </div>

          {(isProcessing || waiting) && (
            <div className="form-actions">
              <button className="btn btn-secondary" onClick={() => void handleCancel()}>
                Cancel
              </button>
            </div>
          )}
        </div>
      )}

      {/* Start button for pending jobs */}
      {job.status === 'pending' && !waiting && (
        <div className="card start-section">
          <h2>Ready to Start</h2>
          <p>The job is configured but not queued yet.</p>
          <button className="btn btn-primary" onClick={() => void handleStart()}>
            🔥 Burn Subtitles
          </button>
        </div>
      )}

      {waiting && (
        <div className="card start-section">
          <h2>Waiting in the Queue</h2>
          <p>Jobs are burned one at a time. This one starts when the jobs before it finish.</p>
          <button className="btn btn-secondary" onClick={() => void handleCancel()}>
            Remove from Queue
          </button>
        </div>
      )}

      {/* Error display */}
      {job.status === 'failed' && job.error && (
        <div className="card error-section">
          <h2>Error</h2>
          <div className="error-message">{job.error}</div>
          {job.exitCode !== undefined && <p className="exit-code">ffmpeg exit code: {job.exitCode}</p>}
          {job.errorDetails && <pre className="error-details">{job.errorDetails}</pre>}
        </div>
      )}

      {/* ffmpeg command */}
      {job.command && (
        <div className="card command-section">
          <h2>ffmpeg Command</h2>
          <pre className="command-line">{job.command}</pre>
        </div>
      )}

      {/* Subtitle preview */}
      {previewLines.length > 0 && (
        <div className="card subtitles-section">
          <div className="subtitles-header">
            <h2>Subtitles ({job.subtitleLineCount ?? previewLines.length} lines)</h2>
            {previewLines.length > 5 && (
              <button className="btn btn-sm btn-secondary" onClick={() => setShowAllLines(!showAllLines)}>
                {showAllLines ? 'Show Less' : `Show ${previewLines.length}`}
              </button>
            )}
          </div>
          <table className="preview-table">
            <tbody>
              {visibleLines.map((line) => (
                <tr key={line.index}>
                  <td>{line.index}</td>
                  <td>
                    {formatTimestamp(line.startTime)} → {formatTimestamp(line.endTime)}
                  </td>
                  <td className="line-text">{line.text}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}

      {/* Logs section */}
      {job.progress.logs && job.progress.logs.length > 0 && (
        <div className="card logs-section">
          <h2>📋 Log ({job.progress.logs.length} entries)</h2>
          <div className="logs-container">
            {job.progress.logs.map((log, index) => (
              <div key={index} className={`log-entry log-${log.level}`}>
                <span className="log-time">{new Date(log.timestamp).toLocaleTimeString()}</span>
                <span className="log-level-icon">
                  {log.level === 'success' ? '✅' : log.level === 'error' ? '❌' : log.level === 'warn' ? '⚠️' : 'ℹ️'}
                </span>
                <span className="log-message">{log.message}</span>
              </div>
            ))}
            <div ref={logsEndRef} />
          </div>
        </div>
      )}

      {/* Download */}
      {job.status === 'completed' && job.outputPath && (
        <div className="card downloads-section">
          <h2>⬇️ Download</h2>
          <a href={getDownloadUrl(job.id)} className="download-item" download>
            <span className="download-icon">🎬</span>
            <span className="download-label">Subtitled video</span>
            <span className="download-format">{job.outputPath.split(/[\\/]/).pop()}</span>
          </a>
        </div>
      )}
    </div>
  );
}
