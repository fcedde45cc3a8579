import { CsvMapping, EncoderPreset, StyleOverrides } from '../settings';
import { SubtitleFormat, SubtitleLine } from '../subtitles';

/**
 * Possible job status values
 */
export type JobStatus =
  | 'pending'
  | 'validating'
  | 'preparing'
  | 'encoding'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type JobLogLevel = 'info' | 'warn' | 'error' | 'success';

export interface JobLogEntry {
  timestamp: Date;
  level: JobLogLevel;
  message: string;
  stage: JobStatus;
}

/**
 * Detailed progress information for a job
 */
export interface JobProgress {
  stage: JobStatus;
  stageProgress: number; // 0-100
  currentStep: string;
  startedAt?: Date;
  completedStages: JobStatus[];
  errors: string[];
  logs: JobLogEntry[];
}

/**
 * What to burn and how. Style and encoder fields override the persisted
 * settings for this job only.
 */
export interface JobConfig {
  /** Display name, defaults to the video file name */
  name?: string;
  /** Server-side video path, used instead of an uploaded video */
  videoPath?: string;
  /** Server-side subtitle path, used instead of an uploaded subtitle file */
  subtitlePath?: string;
  /** Explicit output file; derived from the settings when omitted */
  outputPath?: string;
  styleOverrides: StyleOverrides;
  crf?: number;
  preset?: EncoderPreset;
  /** Allow stream copy when no filter is applied */
  codecCopy: boolean;
  csvMapping?: CsvMapping | null;
}

/**
 * File reference for uploaded files
 */
export interface UploadedFile {
  originalName: string;
  storedName: string;
  path: string;
  size: number;
}

/**
 * Complete job definition
 */
export interface Job {
  id: string;
  config: JobConfig;
  status: JobStatus;
  progress: JobProgress;

  // Uploaded files
  videoFile?: UploadedFile;
  subtitleFile?: UploadedFile;

  // Processing results
  subtitleFormat?: SubtitleFormat;
  subtitleLineCount?: number;
  subtitlePreview?: SubtitleLine[];
  command?: string;
  outputPath?: string;
  exitCode?: number;

  // Metadata
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
  /** ffmpeg's own error text for failed encodes */
  errorDetails?: string;
}

/**
 * Job creation request
 */
export interface CreateJobRequest {
  config: JobConfig;
}

/**
 * Job list response
 */
export interface JobListItem {
  id: string;
  name: string;
  videoName: string | null;
  subtitleName: string | null;
  status: JobStatus;
  createdAt: Date;
  progress: number; // 0-100 overall
}

/**
 * Share of the overall progress taken by each processing stage
 */
const STAGE_WEIGHTS: Partial<Record<JobStatus, number>> = {
  validating: 5,
  preparing: 5,
  encoding: 90,
};

const STAGE_ORDER: JobStatus[] = ['validating', 'preparing', 'encoding'];

export function isFinished(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/**
 * Calculates overall progress percentage from job status
 */
export function calculateOverallProgress(job: Job): number {
  if (job.status === 'completed') return 100;
  if (job.status === 'pending') return 0;

  const stage = job.status === 'failed' || job.status === 'cancelled' ? job.progress.stage : job.status;
  const currentIndex = STAGE_ORDER.indexOf(stage);
  if (currentIndex === -1) return 0;

  const base = STAGE_ORDER.slice(0, currentIndex).reduce(
    (sum, done) => sum + (STAGE_WEIGHTS[done] ?? 0),
    0
  );
  const weight = STAGE_WEIGHTS[stage] ?? 0;

  return Math.min(99, Math.round(base + (job.progress.stageProgress / 100) * weight));
}

/**
 * Resolved input paths: a server-side path wins over an uploaded file
 */
export function getJobVideoPath(job: Job): string | null {
  return job.config.videoPath ?? job.videoFile?.path ?? null;
}

export function getJobSubtitlePath(job: Job): string | null {
  return job.config.subtitlePath ?? job.subtitleFile?.path ?? null;
}
