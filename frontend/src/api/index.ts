import axios from 'axios';

const api = axios.create({
  baseURL: '/api',
  headers: {
    'Content-Type': 'application/json',
  },
});

// Types
export type JobStatus =
  | 'pending'
  | 'validating'
  | 'preparing'
  | 'encoding'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const ENCODER_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;

export type EncoderPreset = (typeof ENCODER_PRESETS)[number];

export function isEncoderPreset(value: string): value is EncoderPreset {
  return ENCODER_PRESETS.some((preset) => preset === value);
}

export interface StyleSettings {
  fontFamily: string;
  fontSize: number;
  fontColor: string;
  outlineColor: string;
  outlineWidth: number;
  bold: boolean;
  shadow: boolean;
  marginV: number;
}

export type StyleOverrides = Partial<StyleSettings>;

export type CsvColumnRef = string | number;
export type CsvTimeUnit = 'seconds' | 'frames';

export interface CsvMapping {
  startColumn: CsvColumnRef;
  endColumn?: CsvColumnRef | null;
  textColumn: CsvColumnRef;
  timeUnit: CsvTimeUnit;
  fps: number;
}

export interface AppSettings {
  font: StyleSettings;
  crf: number;
  preset: EncoderPreset;
  outputDir: string;
  csvMappings: Record<string, CsvMapping>;
}

export interface SettingsPatch {
  font?: StyleOverrides;
  crf?: number;
  preset?: EncoderPreset;
  outputDir?: string;
}

export interface JobConfig {
  name?: string;
  /** Server-side video path, instead of an upload */
  videoPath?: string;
  /** Server-side subtitle path, instead of an upload */
  subtitlePath?: string;
  outputPath?: string;
  styleOverrides: StyleOverrides;
  crf?: number;
  preset?: EncoderPreset;
  codecCopy: boolean;
  csvMapping?: CsvMapping | null;
}

export interface LogEntry {
  timestamp: string;
  level: 'info' | 'warn' | 'error' | 'success';
  message: string;
  stage?: JobStatus;
}

export interface JobProgress {
  stage: JobStatus;
  stageProgress: number;
  currentStep: string;
  completedStages: JobStatus[];
  errors: string[];
  logs?: LogEntry[];
}

export interface UploadedFile {
  originalName: string;
  size: number;
}

export interface SubtitleLine {
  index: number;
  startTime: number;
  endTime: number;
  text: string;
}

export type SubtitleFormat = 'srt' | 'ass' | 'csv';

export interface Job {
  id: string;
  config: JobConfig;
  status: JobStatus;
  progress: JobProgress;
  videoFile?: UploadedFile;
  subtitleFile?: UploadedFile;
  subtitleFormat?: SubtitleFormat;
  subtitleLineCount?: number;
  subtitlePreview?: SubtitleLine[];
  command?: string;
  outputPath?: string;
  exitCode?: number;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  error?: string;
  errorDetails?: string;
}

export interface JobListItem {
  id: string;
  name: string;
  videoName: string | null;
  subtitleName: string | null;
  status: JobStatus;
  createdAt: string;
  progress: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  services: {
    ffmpeg: { available: boolean; version: string | null; path: string };
  };
  config: {
    settingsPath: string;
    maxFileSize: number;
  };
}

export interface SettingsResponse {
  settings: AppSettings;
  defaults: AppSettings;
  presets: EncoderPreset[];
}

export interface SubtitlePreview {
  format: SubtitleFormat;
  lineCount: number;
  lines: SubtitleLine[];
}

export interface CsvColumns {
  columns: string[];
  mapping: CsvMapping;
  saved: boolean;
}

export interface BatchPair {
  videoPath: string;
  subtitlePath: string;
}

export interface BatchPlan {
  pairs: BatchPair[];
  /** Videos that found no subtitle */
  unmatched: string[];
  /** Paths that are neither videos nor subtitles */
  ignored: string[];
}

/** Refers to a subtitle file on the server or to a job's subtitle */
export type SubtitleSource = { path: string } | { jobId: string };

/**
 * Message to show for a failed request: the server's `error` field when present
 */
export function getErrorMessage(err: unknown, fallback: string): string {
  if (axios.isAxiosError<{ error?: string }>(err)) {
    return err.response?.data?.error ?? fallback;
  }
  return err instanceof Error ? err.message : fallback;
}

// API functions
export async function getHealth(): Promise<HealthStatus> {
  const response = await api.get<HealthStatus>('/health');
  return response.data;
}

export async function listJobs(): Promise<JobListItem[]> {
  const response = await api.get<{ jobs: JobListItem[] }>('/jobs');
  return response.data.jobs;
}

export async function getJob(
  id: string
): Promise<{ job: Job; overallProgress: number; queued: boolean }> {
  const response = await api.get<{ job: Job; overallProgress: number; queued: boolean }>(`/jobs/${id}`);
  return response.data;
}

export async function createJob(config: JobConfig): Promise<Job> {
  const response = await api.post<{ job: Job }>('/jobs', { config });
  return response.data.job;
}

export async function planBatch(paths: string[]): Promise<BatchPlan> {
  const response = await api.post<BatchPlan>('/jobs/batch/plan', { paths });
  return response.data;
}

/**
 * Creates and queues one job per video in `paths`, sharing `config`
 */
export async function createBatch(
  paths: string[],
  config: JobConfig
): Promise<{ jobs: Job[]; unmatched: string[]; ignored: string[] }> {
  const response = await api.post<{ jobs: Job[]; unmatched: string[]; ignored: string[] }>('/jobs/batch', {
    paths,
    config,
    start: true,
  });
  return response.data;
}

export async function updateJobConfig(id: string, config: JobConfig): Promise<Job> {
  const response = await api.put<{ job: Job }>(`/jobs/${id}/config`, { config });
  return response.data.job;
}

export async function startJob(id: string): Promise<void> {
  await api.post(`/jobs/${id}/start`);
}

export async function cancelJob(id: string): Promise<void> {
  await api.post(`/jobs/${id}/cancel`);
}

export async function deleteJob(id: string): Promise<void> {
  await api.delete(`/jobs/${id}`);
}

async function uploadFile(jobId: string, type: 'video' | 'subtitle', file: File): Promise<UploadedFile> {
  const formData = new FormData();
  formData.append('file', file);
  const response = await api.post<{ file: { name: string; size: number } }>(
    `/upload/${jobId}/${type}`,
    formData,
    { headers: { 'Content-Type': 'multipart/form-data' } }
  );
  return { originalName: response.data.file.name, size: response.data.file.size };
}

export function uploadVideo(jobId: string, file: File): Promise<UploadedFile> {
  return uploadFile(jobId, 'video', file);
}

export function uploadSubtitle(jobId: string, file: File): Promise<UploadedFile> {
  return uploadFile(jobId, 'subtitle', file);
}

export function getDownloadUrl(jobId: string): string {
  return `/api/jobs/${jobId}/download`;
}

export async function getSettings(): Promise<SettingsResponse> {
  const response = await api.get<SettingsResponse>('/settings');
  return response.data;
}

export async function updateSettings(patch: SettingsPatch): Promise<AppSettings> {
  const response = await api.put<{ settings: AppSettings }>('/settings', patch);
  return response.data.settings;
}

export async function resetSettings(): Promise<AppSettings> {
  const response = await api.post<{ settings: AppSettings }>('/settings/reset');
  return response.data.settings;
}

export async function saveCsvMapping(path: string, mapping: CsvMapping): Promise<AppSettings> {
  const response = await api.put<{ settings: AppSettings }>('/settings/csv-mappings', { path, mapping });
  return response.data.settings;
}

export async function previewSubtitles(
  source: SubtitleSource,
  csvMapping?: CsvMapping | null
): Promise<SubtitlePreview> {
  const response = await api.post<SubtitlePreview>('/subtitles/preview', { ...source, csvMapping });
  return response.data;
}

export async function getCsvColumns(source: SubtitleSource): Promise<CsvColumns> {
  const response = await api.post<CsvColumns>('/subtitles/csv-columns', source);
  return response.data;
}

/**
 * Subtitle with the same name beside a server-side video, or null
 */
export async function matchSubtitle(videoPath: string): Promise<string | null> {
  const response = await api.post<{ subtitlePath: string | null }>('/subtitles/match', { videoPath });
  return response.data.subtitlePath;
}
