import express from 'express';
import cors from 'cors';
import fs from 'fs';
import apiRouter from './api';
import { errorHandler, notFoundHandler } from './api/middleware';
import { config } from './config';

// Ensure data directories exist
const dirs = [config.dataDir, config.uploadsDir, config.outputsDir, config.jobsDir, config.tempDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// API routes
app.use('/api', apiRouter);

app.use(errorHandler);
app.use(notFoundHandler);

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎬 SubBurn Backend`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Settings: ${config.settingsPath}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health               - Check ffmpeg`);
  console.info(`   - GET  /api/settings             - Style settings`);
  console.info(`   - GET  /api/jobs                 - List all jobs`);
  console.info(`   - POST /api/jobs                 - Create new job`);
  console.info(`   - POST /api/upload/:id/video     - Upload the video`);
  console.info(`   - POST /api/upload/:id/subtitle  - Upload the subtitle file`);
  console.info(`   - POST /api/jobs/:id/start       - Queue for burning`);
  console.info(`   - POST /api/jobs/:id/cancel      - Cancel`);
  console.info(`\n`);
});

export default app;
