import fs from 'fs';
import path from 'path';
import { config } from '../config';
import {
  describeError,
  FFmpegError,
  InputFileError,
  JobCancelledError,
  SubBurnError,
} from '../errors';
import { jobStore, JobStore } from '../jobs/jobStore';
import { getJobSubtitlePath, getJobVideoPath, Job } from '../jobs/types';
import {
  AppSettings,
  applyStyleOverrides,
  EncoderSettings,
  settingsStore,
  SettingsStore,
  StyleSettings,
  validateEncoder,
  validateStyle,
} from '../settings';
import {
  detectSubtitleFormat,
  PREVIEW_LINE_LIMIT,
  prepareSubtitleForBurn,
  PreparedSubtitles,
} from '../subtitles';
import {
  deriveOutputPath,
  FFmpegCommandBuilder,
  FFmpegProcessor,
  formatCommandLine,
} from '../video';

/**
 * Everything validated before any work is done
 */
interface BurnPlan {
  videoPath: string;
  subtitlePath: string;
  outputPath: string;
  settings: AppSettings;
  style: StyleSettings;
  encoder: EncoderSettings;
}

export type BurnProcessor = Pick<FFmpegProcessor, 'ffmpegPath' | 'isAvailable' | 'getDuration' | 'run'>;

export interface BurnPipelineOptions {
  store?: JobStore;
  ffmpeg?: BurnProcessor;
  settings?: Pick<SettingsStore, 'load'>;
  tempDir?: string;
  verbose?: boolean;
}

/**
 * Where the GUI writes a job's output when the job names no file:
 * the configured output folder, the job's output folder for uploaded videos,
 * or an `output` folder next to a server-side video
 */
export function resolveJobOutputPath(
  job: Job,
  videoPath: string,
  settings: AppSettings,
  outputDirForUploads: string
): string {
  if (job.config.outputPath) {
    return job.config.outputPath;
  }
  if (settings.outputDir) {
    return deriveOutputPath(videoPath, settings.outputDir);
  }
  if (!job.config.videoPath) {
    return deriveOutputPath(videoPath, outputDirForUploads);
  }
  return deriveOutputPath(videoPath, path.join(path.dirname(videoPath), 'output'));
}

/**
 * Burns subtitles for queued jobs, one at a time in arrival order
 */
export class BurnPipeline {
  private store: JobStore;
  private ffmpeg: BurnProcessor;
  private settings: Pick<SettingsStore, 'load'>;
  private tempDir: string;
  private verbose: boolean;

  private queue: Promise<void> = Promise.resolve();
  private waiting = new Set<string>();
  private running: { jobId: string; controller: AbortController } | null = null;

  constructor(options: BurnPipelineOptions = {}) {
    this.store = options.store ?? jobStore;
    this.ffmpeg = options.ffmpeg ?? new FFmpegProcessor();
    this.settings = options.settings ?? settingsStore;
    this.tempDir = options.tempDir ?? config.tempDir;
    this.verbose = options.verbose ?? config.verbose;
  }

  /**
   * Adds a job to the queue
   * @returns Resolves once the job has finished, whatever its outcome
   */
  enqueue(jobId: string): Promise<void> {
    this.waiting.add(jobId);

    const task = this.queue.then(async () => {
      // Cancelled while waiting
      if (!this.waiting.delete(jobId)) return;
      await this.run(jobId);
    });

    this.queue = task.catch((error: unknown) => {
      console.error(`Pipeline failed for job ${jobId}:`, describeError(error));
    });
    return this.queue;
  }

  isQueued(jobId: string): boolean {
    return this.waiting.has(jobId) || this.running?.jobId === jobId;
  }

  /**
   * Removes a waiting job from the queue or stops the running encode
   * @returns False when the job is neither queued nor running
   */
  async cancel(jobId: string): Promise<boolean> {
    if (this.waiting.delete(jobId)) {
      await this.store.setCancelled(jobId);
      return true;
    }
    if (this.running?.jobId === jobId) {
      this.running.controller.abort();
      return true;
    }
    return false;
  }

  /**
   * Runs the complete pipeline for a job.
   * The job counts as running from the first call, so it can be cancelled
   * while it is still being loaded.
   */
  async run(jobId: string): Promise<void> {
    const controller = new AbortController();
    this.running = { jobId, controller };

    try {
      const job = await this.store.get(jobId);
      if (!job) {
        throw new Error(`Job ${jobId} not found`);
      }
      await this.process(job, controller.signal);
    } finally {
      this.running = null;
    }
  }

  private async process(job: Job, signal: AbortSignal): Promise<void> {
    let prepared: PreparedSubtitles | null = null;

    try {
      this.throwIfCancelled(signal);

      // Stage 1: Validate inputs and settings
      const plan = await this.validateInputs(job);
      this.throwIfCancelled(signal);

      // Stage 2: Parse subtitles
      prepared = await this.prepareSubtitles(job, plan);
      this.throwIfCancelled(signal);

      // Stage 3: Encode
      await this.encode(job, plan, prepared, signal);

      await this.store.updateStatus(job.id, 'completed', 'Subtitles burned', 100);
      await this.store.addLog(job.id, 'success', `Output written to ${plan.outputPath}`);
    } catch (error) {
      if (error instanceof JobCancelledError) {
        await this.store.setCancelled(job.id);
        return;
      }

      const details = error instanceof FFmpegError && error.stderrTail ? error.stderrTail : undefined;
      const message = error instanceof Error ? error.message : 'Unknown error';
      await this.store.setFailed(job.id, message, details);
      throw error;
    } finally {
      prepared?.cleanup();
    }
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new JobCancelledError();
    }
  }

  /**
   * Stage 1: Validate inputs
   */
  private async validateInputs(job: Job): Promise<BurnPlan> {
    await this.store.updateStatus(job.id, 'validating', 'Validating input files', 0);

    if (!this.ffmpeg.isAvailable()) {
      throw new FFmpegError(
        -1,
        '',
        `FFmpeg was not found at "${this.ffmpeg.ffmpegPath}". Install FFmpeg or set FFMPEG_PATH.`
      );
    }

    const videoPath = getJobVideoPath(job);
    if (!videoPath) {
      throw new SubBurnError('INPUT_FILE', 'No video file selected');
    }
    if (!fs.existsSync(videoPath)) {
      throw new InputFileError(videoPath, 'Video file not found');
    }

    const subtitlePath = getJobSubtitlePath(job);
    if (!subtitlePath) {
      throw new SubBurnError('INPUT_FILE', 'No subtitle file selected');
    }
    detectSubtitleFormat(subtitlePath);
    if (!fs.existsSync(subtitlePath)) {
      throw new InputFileError(subtitlePath, 'Subtitle file not found');
    }

    // Overrides apply to this copy only; the settings file is never written here
    const settings = this.settings.load();
    const style = validateStyle(applyStyleOverrides(settings.font, job.config.styleOverrides));
    const encoder = validateEncoder({
      crf: job.config.crf ?? settings.crf,
      preset: job.config.preset ?? settings.preset,
    });

    const outputPath = path.resolve(
      resolveJobOutputPath(job, videoPath, settings, this.store.getOutputDir(job.id))
    );
    if (outputPath === path.resolve(videoPath)) {
      throw new InputFileError(outputPath, 'Output would overwrite the input video');
    }

    await this.store.updateProgress(job.id, 'Input validation complete', 100);
    return { videoPath, subtitlePath, outputPath, settings, style, encoder };
  }

  /**
   * Stage 2: Parse the subtitle file, converting CSV to ASS
   */
  private async prepareSubtitles(job: Job, plan: BurnPlan): Promise<PreparedSubtitles> {
    await this.store.updateStatus(job.id, 'preparing', 'Reading subtitles', 0);

    const csvMapping = job.config.csvMapping ?? plan.settings.csvMappings[plan.subtitlePath] ?? null;
    const prepared = prepareSubtitleForBurn(plan.subtitlePath, {
      style: plan.style,
      csvMapping,
      tempDir: this.tempDir,
    });

    await this.store.update(job.id, (stored) => {
      stored.subtitleFormat = prepared.format;
      stored.subtitleLineCount = prepared.lines.length;
      stored.subtitlePreview = prepared.lines.slice(0, PREVIEW_LINE_LIMIT);
    });
    await this.store.addLog(
      job.id,
      'info',
      `Parsed ${prepared.lines.length} ${prepared.format.toUpperCase()} subtitle lines`
    );
    await this.store.updateProgress(job.id, 'Subtitles ready', 100);

    return prepared;
  }

  /**
   * Stage 3: Run ffmpeg and report its progress
   */
  private async encode(
    job: Job,
    plan: BurnPlan,
    prepared: PreparedSubtitles,
    signal: AbortSignal
  ): Promise<void> {
    await this.store.updateStatus(job.id, 'encoding', 'Starting ffmpeg', 0);

    const args = new FFmpegCommandBuilder()
      .video(plan.videoPath)
      .subtitles(prepared.burnPath, plan.style)
      .encoder(plan.encoder.crf, plan.encoder.preset)
      .codecCopy(job.config.codecCopy)
      .output(plan.outputPath)
      .build();
    const command = formatCommandLine(this.ffmpeg.ffmpegPath, args);

    const outputDir = path.dirname(plan.outputPath);
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }

    await this.store.update(job.id, (stored) => {
      stored.command = command;
      stored.outputPath = plan.outputPath;
    });
    await this.store.addLog(job.id, 'info', `Running: ${command}`);
    console.info(`Job ${job.id}: ${command}`);

    const duration = await this.ffmpeg.getDuration(plan.videoPath);

    let lastPercent = -1;
    let progressWrites = Promise.resolve();

    try {
      const result = await this.ffmpeg.run(args, {
        signal,
        duration,
        onProgress: (ratio) => {
          const percent = Math.round(ratio * 100);
          if (percent === lastPercent) return;
          lastPercent = percent;
          progressWrites = progressWrites
            .then(() => this.store.updateProgress(job.id, `Encoding ${percent}%`, percent))
            .catch((error: unknown) => {
              console.warn(`Could not record progress for job ${job.id}:`, describeError(error));
            });
        },
        onLine: (line) => {
          if (this.verbose) console.debug(`[ffmpeg] ${line}`);
        },
      });

      await progressWrites;
      await this.store.update(job.id, (stored) => {
        stored.exitCode = result.exitCode;
      });
    } catch (error) {
      await progressWrites;
      if (error instanceof FFmpegError) {
        const { exitCode } = error;
        await this.store.update(job.id, (stored) => {
          stored.exitCode = exitCode;
        });
      }
      throw error;
    }
  }
}

// Singleton instance
export const burnPipeline = new BurnPipeline();
