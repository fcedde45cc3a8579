import { useState, useEffect } from 'react';
import { Link } from 'react-router-dom';
import { listJobs, deleteJob, getErrorMessage, JobListItem } from '../api';
import { formatDate } from '../utils/format';
import { getStatusClass, isActive } from '../utils/jobStatus';
import './JobsList.css';

export function JobsList() {
  const [jobs, setJobs] = useState<JobListItem[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const fetchJobs = async () => {
    try {
      setLoading(true);
      const data = await listJobs();
      setJobs(data);
      setError(null);
    } catch (err) {
      setError('Failed to load jobs');
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  useEffect(() => {
    void fetchJobs();
    // The queue moves on its own, refresh every 3 seconds
    const interval = setInterval(() => void fetchJobs(), 3000);
    return () => clearInterval(interval);
  }, []);

  const handleDelete = async (id: string, e: React.MouseEvent) => {
    e.preventDefault();
    if (!confirm('Are you sure you want to delete this job?')) return;

    try {
      await deleteJob(id);
      setJobs((current) => current.filter((j) => j.id !== id));
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to delete job'));
      console.error(err);
    }
  };

  if (loading && jobs.length === 0) {
    return <div className="loading">Loading jobs...</div>;
  }

  return (
    <div className="jobs-list-page">
      <div className="page-header">
        <h1 className="page-title">Burn Queue</h1>
        <Link to="/create" className="btn btn-primary">
          + New Job
        </Link>
      </div>

      {error && <div className="error-message">{error}</div>}

      {jobs.length === 0 ? (
        <div className="empty-state card">
          <h3>No jobs yet</h3>
          <p>Pick a video and a subtitle file to burn them together.</p>
          <Link to="/create" className="btn btn-primary">
            Create Job
          </Link>
        </div>
      ) : (
        <div className="jobs-grid">
          {jobs.map((job) => (
            <Link to={`/job/${job.id}`} key={job.id} className="job-card card">
              <div className="job-card-header">
                <h3>{job.name}</h3>
                <span className={`status-badge ${getStatusClass(job.status)}`}>{job.status}</span>
              </div>

              <div className="job-card-meta">
                <span className="file-name" title="Subtitle file">
                  {job.subtitleName ?? 'No subtitle yet'}
                </span>
                <span className="date">{formatDate(job.createdAt)}</span>
              </div>

              {isActive(job.status) && (
                <div className="progress-bar-container">
                  <div className="progress-bar" style={{ width: `${job.progress}%` }} />
                  <span className="progress-text">{job.progress}%</span>
                </div>
              )}

              {!isActive(job.status) && (
                <button
                  className="delete-btn"
                  onClick={(e) => void handleDelete(job.id, e)}
                  title="Delete job"
                >
                  🗑️
                </button>
              )}
            </Link>
          ))}
        </div>
      )}
    </div>
  );
}
