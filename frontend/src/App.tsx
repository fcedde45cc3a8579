import { Routes, Route, Link } from 'react-router-dom';
import { JobsList } from './pages/JobsList';
import { CreateJob } from './pages/CreateJob';
import { BatchJobs } from './pages/BatchJobs';
import { JobDetails } from './pages/JobDetails';
import { StyleSettings } from './pages/StyleSettings';
import './App.css';

function App() {
  return (
    <div className="app">
      <header className="app-header">
        <h1>
          <Link to="/">🔥 SubBurn</Link>
        </h1>
        <nav>
          <Link to="/" className="nav-link">
            Jobs
          </Link>
          <Link to="/batch" className="nav-link">
            Batch
          </Link>
          <Link to="/settings" className="nav-link">
            Style
          </Link>
          <Link to="/create" className="nav-link primary">
            + New Job
          </Link>
        </nav>
      </header>

      <main className="app-main">
        <Routes>
          <Route path="/" element={<JobsList />} />
          <Route path="/create" element={<CreateJob />} />
          <Route path="/batch" element={<BatchJobs />} />
          <Route path="/job/:id" element={<JobDetails />} />
          <Route path="/settings" element={<StyleSettings />} />
        </Routes>
      </main>

      <footer className="app-footer">
        <p>SubBurn v0.1 - Burn subtitles into videos with ffmpeg</p>
      </footer>
    </div>
  );
}

export default App;
