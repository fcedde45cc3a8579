import { useState } from 'react';
import { useNavigate } from 'react-router-dom';
import { BatchPlan, createBatch, getErrorMessage, planBatch } from '../api';
import { baseName, parsePathList } from '../utils/pathList';
import './BatchJobs.css';

export function BatchJobs() {
  const navigate = useNavigate();
  const [text, setText] = useState('');
  const [codecCopy, setCodecCopy] = useState(true);
  const [plan, setPlan] = useState<BatchPlan | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const paths = parsePathList(text);

  const handlePlan = async () => {
    if (paths.length === 0) {
      setError('Enter at least one video path');
      return;
    }

    setLoading(true);
    setError(null);
    try {
      setPlan(await planBatch(paths));
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to pair the files'));
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  const handleQueue = async () => {
    setLoading(true);
    setError(null);
    try {
      await createBatch(paths, { styleOverrides: {}, codecCopy });
      navigate('/');
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to queue the batch'));
      console.error(err);
      setLoading(false);
    }
  };

  return (
    <div className="batch-page">
      <h1 className="page-title">Batch Burn</h1>

      {error && <div className="error-message">{error}</div>}

      <div className="card form-card">
        <div className="form-group">
          <label htmlFor="paths">Videos and subtitles on the server</label>
          <textarea
            id="paths"
            rows={8}
            value={text}
            onChange={(e) => {
              setText(e.target.value);
              setPlan(null);
            }}
            placeholder={'/home/me/Videos/ep1.mp4\n/home/me/Videos/ep1.srt\n/home/me/Videos/ep2.mp4'}
          />
          <small className="form-hint">
            One path per line. Each video gets the subtitle with the same name, from this list or from its own
            folder, otherwise the first subtitle listed. The saved style is used for every job.
          </small>
        </div>

        <label className="checkbox-label">
          <input type="checkbox" checked={codecCopy} onChange={(e) => setCodecCopy(e.target.checked)} />
          Allow stream copy
        </label>

        <div className="form-actions">
          <button className="btn btn-secondary" onClick={() => void handlePlan()} disabled={loading}>
            Pair Files
          </button>
        </div>
      </div>

      {plan && (
        <div className="card">
          <h2>Pairing</h2>
          {plan.pairs.length > 0 ? (
            <table className="batch-table">
              <thead>
                <tr>
                  <th>Video</th>
                  <th>Subtitles</th>
                </tr>
              </thead>
              <tbody>
                {plan.pairs.map((pair) => (
                  <tr key={pair.videoPath}>
                    <td title={pair.videoPath}>{baseName(pair.videoPath)}</td>
                    <td title={pair.subtitlePath}>{baseName(pair.subtitlePath)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          ) : (
            <p className="batch-note">No video has a subtitle yet.</p>
          )}

          {plan.unmatched.length > 0 && (
            <p className="batch-warning">No subtitle found for: {plan.unmatched.map(baseName).join(', ')}</p>
          )}
          {plan.ignored.length > 0 && (
            <p className="batch-note">Ignored: {plan.ignored.map(baseName).join(', ')}</p>
          )}

          <div className="form-actions">
            <button
              className="btn btn-primary"
              onClick={() => void handleQueue()}
              disabled={loading || plan.pairs.length === 0}
            >
              {loading ? 'Queueing...' : `Queue ${plan.pairs.length} Job${plan.pairs.length === 1 ? '' : 's'}`}
            </button>
          </div>
        </div>
      )}
    </div>
  );
}
