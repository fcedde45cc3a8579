import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  Job,
  JobStatus,
  CreateJobRequest,
  JobListItem,
  JobLogLevel,
  UploadedFile,
  calculateOverallProgress,
} from './types';
import { config } from '../config';
import { isRecord } from '../settings';

const MAX_LOG_ENTRIES = 100;

export interface JobStoreOptions {
  jobsDir?: string;
  uploadsDir?: string;
  outputsDir?: string;
}

function isJob(value: unknown): value is Job {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.status === 'string' &&
    isRecord(value.config) &&
    isRecord(value.progress)
  );
}

/**
 * Simple file-based job store
 */
export class JobStore {
  private jobsDir: string;
  private uploadsDir: string;
  private outputsDir: string;

  constructor(options: JobStoreOptions = {}) {
    this.jobsDir = options.jobsDir ?? config.jobsDir;
    this.uploadsDir = options.uploadsDir ?? config.uploadsDir;
    this.outputsDir = options.outputsDir ?? config.outputsDir;
    this.ensureDirectory();
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.jobsDir)) {
      fs.mkdirSync(this.jobsDir, { recursive: true });
    }
  }

  private getJobPath(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  private async require(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Creates a new job
   */
  async create(request: CreateJobRequest): Promise<Job> {
    const jobId = uuidv4();
    const now = new Date();

    const job: Job = {
      id: jobId,
      config: request.config,
      status: 'pending',
      progress: {
        stage: 'pending',
        stageProgress: 0,
        currentStep: 'Waiting to start',
        completedStages: [],
        errors: [],
        logs: [],
      },
      createdAt: now,
      updatedAt: now,
    };

    await this.save(job);

    // Create upload and output directories for this job
    for (const dir of [this.getUploadDir(jobId), this.getOutputDir(jobId)]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    return job;
  }

  /**
   * Gets a job by ID
   */
  async get(jobId: string): Promise<Job | null> {
    // Job ids are uuids; anything else must not reach the filesystem
    if (!/^[\w-]+$/.test(jobId)) {
      return null;
    }

    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return null;
    }

    try {
      const job: unknown = JSON.parse(fs.readFileSync(jobPath, 'utf-8'));
      if (!isJob(job)) {
        console.error(`Job file ${jobPath} has an unexpected shape`);
        return null;
      }

      // Convert date strings back to Date objects
      job.createdAt = new Date(job.createdAt);
      job.updatedAt = new Date(job.updatedAt);
      if (job.completedAt) {
        job.completedAt = new Date(job.completedAt);
      }
      if (job.progress.startedAt) {
        job.progress.startedAt = new Date(job.progress.startedAt);
      }
      job.progress.logs = (job.progress.logs ?? []).map((entry) => ({
        ...entry,
        timestamp: new Date(entry.timestamp),
      }));

      return job;
    } catch (error) {
      console.error(`Failed to read job ${jobId}:`, error);
      return null;
    }
  }

  /**
   * Saves a job
   */
  async save(job: Job): Promise<void> {
    job.updatedAt = new Date();
    this.ensureDirectory();
    fs.writeFileSync(this.getJobPath(job.id), JSON.stringify(job, null, 2), 'utf-8');
  }

  /**
   * Applies a change to a stored job and saves it
   */
  async update(jobId: string, change: (job: Job) => void): Promise<Job> {
    const job = await this.require(jobId);
    change(job);
    await this.save(job);
    return job;
  }

  /**
   * Updates job status and progress
   */
  async updateStatus(
    jobId: string,
    status: JobStatus,
    currentStep: string,
    stageProgress: number = 0
  ): Promise<void> {
    const job = await this.require(jobId);

    // Mark previous stage as completed if moving to a new stage
    if (job.status !== status && job.status !== 'pending' && job.status !== 'failed') {
      job.progress.completedStages.push(job.status);
    }

    if (status === 'validating' && !job.progress.startedAt) {
      job.progress.startedAt = new Date();
    }

    job.status = status;
    job.progress.stage = status;
    job.progress.stageProgress = stageProgress;
    job.progress.currentStep = currentStep;

    if (status === 'completed') {
      job.completedAt = new Date();
    }

    await this.save(job);
  }

  /**
   * Updates stage progress within current status
   */
  async updateProgress(jobId: string, currentStep: string, stageProgress: number): Promise<void> {
    const job = await this.require(jobId);

    job.progress.currentStep = currentStep;
    job.progress.stageProgress = stageProgress;

    await this.save(job);
  }

  /**
   * Sets job as failed with error message. The progress keeps the stage that failed.
   */
  async setFailed(jobId: string, error: string, details?: string): Promise<void> {
    await this.addLog(jobId, 'error', `Processing failed: ${error}`);

    const job = await this.require(jobId);
    job.status = 'failed';
    job.progress.errors.push(error);
    job.progress.currentStep = 'Failed';
    job.error = error;
    if (details) {
      job.errorDetails = details;
    }
    job.completedAt = new Date();

    await this.save(job);
  }

  /**
   * Marks a job as cancelled by the user
   */
  async setCancelled(jobId: string): Promise<void> {
    await this.addLog(jobId, 'warn', 'Processing was cancelled');

    const job = await this.require(jobId);
    job.status = 'cancelled';
    job.progress.currentStep = 'Cancelled';
    job.completedAt = new Date();

    await this.save(job);
  }

  /**
   * Adds a log entry to a job
   */
  async addLog(jobId: string, level: JobLogLevel, message: string, stage?: JobStatus): Promise<void> {
    const job = await this.get(jobId);
    if (!job) {
      return; // Logging never fails a job
    }

    job.progress.logs.push({
      timestamp: new Date(),
      level,
      message,
      stage: stage ?? job.status,
    });

    // Keep only the most recent entries
    if (job.progress.logs.length > MAX_LOG_ENTRIES) {
      job.progress.logs = job.progress.logs.slice(-MAX_LOG_ENTRIES);
    }

    await this.save(job);
  }

  /**
   * Attaches an uploaded file to a job, replacing any earlier one of the same kind
   */
  async setFile(jobId: string, file: UploadedFile, type: 'video' | 'subtitle'): Promise<Job> {
    return this.update(jobId, (job) => {
      if (type === 'video') {
        job.videoFile = file;
      } else {
        job.subtitleFile = file;
      }
    });
  }

  /**
   * Lists all jobs
   */
  async list(): Promise<JobListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.jobsDir).filter((f) => f.endsWith('.json'));

    const jobs: JobListItem[] = [];

    for (const file of files) {
      const job = await this.get(path.basename(file, '.json'));
      if (!job) continue;

      const videoName = job.videoFile?.originalName ?? (job.config.videoPath ? path.basename(job.config.videoPath) : null);
      const subtitleName =
        job.subtitleFile?.originalName ?? (job.config.subtitlePath ? path.basename(job.config.subtitlePath) : null);

      jobs.push({
        id: job.id,
        name: job.config.name ?? videoName ?? job.id,
        videoName,
        subtitleName,
        status: job.status,
        createdAt: job.createdAt,
        progress: calculateOverallProgress(job),
      });
    }

    // Sort by creation date, newest first
    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a job and its files
   */
  async delete(jobId: string): Promise<boolean> {
    const job = await this.get(jobId);
    if (!job) {
      return false;
    }

    fs.unlinkSync(this.getJobPath(jobId));

    for (const dir of [this.getUploadDir(jobId), this.getOutputDir(jobId)]) {
      if (fs.existsSync(dir)) {
        fs.rmSync(dir, { recursive: true });
      }
    }

    return true;
  }

  /**
   * Gets the upload directory for a job
   */
  getUploadDir(jobId: string): string {
    return path.join(this.uploadsDir, jobId);
  }

  /**
   * Gets the output directory for a job
   */
  getOutputDir(jobId: string): string {
    return path.join(this.outputsDir, jobId);
  }
}

// Singleton instance
export const jobStore = new JobStore();
