import { Router, Request, Response } from 'express';
import path from 'path';
import fs from 'fs';
import { Job, jobStore, planBatch } from '../jobs';
import { burnPipeline } from '../pipelines';
import { calculateOverallProgress, isFinished } from '../jobs/types';
import { asyncHandler } from './middleware';
import { parseBatchRequest, parseJobConfig } from './requestParsers';

const router = Router();

async function queueJob(jobId: string): Promise<void> {
  await jobStore.updateProgress(jobId, 'Queued', 0);
  await jobStore.addLog(jobId, 'info', 'Job queued');

  // Runs in the background; failures are recorded on the job
  void burnPipeline.enqueue(jobId);
}

/**
 * GET /api/jobs
 * List all jobs
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const jobs = await jobStore.list();
    res.json({ jobs });
  })
);

/**
 * POST /api/jobs
 * Create a new job. Files come from server paths in the config or later uploads.
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const jobConfig = parseJobConfig(req.body);
    const job = await jobStore.create({ config: jobConfig });
    res.status(201).json({ job });
  })
);

/**
 * POST /api/jobs/batch/plan
 * Show how a list of video and subtitle paths would be paired, without creating jobs
 */
router.post(
  '/batch/plan',
  asyncHandler(async (req: Request, res: Response) => {
    const { paths } = parseBatchRequest(req.body);
    res.json(planBatch(paths));
  })
);

/**
 * POST /api/jobs/batch
 * Create one job per video in `paths`, each paired with its subtitle, and queue them
 */
router.post(
  '/batch',
  asyncHandler(async (req: Request, res: Response) => {
    const request = parseBatchRequest(req.body);
    const plan = planBatch(request.paths);

    if (plan.pairs.length === 0) {
      res.status(400).json({ error: 'No video in the batch has a subtitle', ...plan });
      return;
    }

    const jobs: Job[] = [];
    for (const pair of plan.pairs) {
      const videoName = path.basename(pair.videoPath);
      const job = await jobStore.create({
        config: {
          ...request.config,
          name: request.config.name ? `${request.config.name} (${videoName})` : videoName,
          videoPath: pair.videoPath,
          subtitlePath: pair.subtitlePath,
        },
      });
      if (request.start) {
        await queueJob(job.id);
      }
      jobs.push(job);
    }

    console.info(`📦 Batch of ${jobs.length} job(s) created`);
    res.status(201).json({ jobs, unmatched: plan.unmatched, ignored: plan.ignored });
  })
);

/**
 * GET /api/jobs/:id
 * Get job details
 */
router.get(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    const overallProgress = calculateOverallProgress(job);
    res.json({ job, overallProgress, queued: burnPipeline.isQueued(job.id) });
  })
);

/**
 * PUT /api/jobs/:id/config
 * Replace the configuration of a job that has not been started
 */
router.put(
  '/:id/config',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'pending' || burnPipeline.isQueued(jobId)) {
      res.status(400).json({ error: 'Job has already been started' });
      return;
    }

    const jobConfig = parseJobConfig(req.body);
    const updated = await jobStore.update(jobId, (stored) => {
      stored.config = jobConfig;
    });
    res.json({ job: updated });
  })
);

/**
 * POST /api/jobs/:id/start
 * Queue a job for processing
 */
router.post(
  '/:id/start',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'pending' || burnPipeline.isQueued(jobId)) {
      res.status(400).json({ error: 'Job has already been started' });
      return;
    }

    await queueJob(jobId);
    res.json({ message: 'Job queued', jobId });
  })
);

/**
 * POST /api/jobs/:id/cancel
 * Cancel a queued or running job
 */
router.post(
  '/:id/cancel',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    const cancelled = await burnPipeline.cancel(jobId);
    if (!cancelled) {
      res.status(400).json({ error: 'Job is not queued or running' });
      return;
    }

    res.json({ message: 'Cancellation requested', jobId });
  })
);

/**
 * DELETE /api/jobs/:id
 * Delete a job
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (burnPipeline.isQueued(jobId) && !isFinished(job.status)) {
      res.status(409).json({ error: 'Cancel the job before deleting it' });
      return;
    }

    await jobStore.delete(jobId);
    res.json({ message: 'Job deleted' });
  })
);

/**
 * GET /api/jobs/:id/download
 * Download the subtitled video
 */
router.get(
  '/:id/download',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'completed' || !job.outputPath) {
      res.status(400).json({ error: 'Job not completed' });
      return;
    }

    if (!fs.existsSync(job.outputPath)) {
      res.status(404).json({ error: 'File not found' });
      return;
    }

    res.download(job.outputPath, path.basename(job.outputPath));
  })
);

export default router;
