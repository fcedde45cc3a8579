import { execFileSync, spawn } from 'child_process';
import { Readable } from 'stream';
import { config } from '../config';
import { FFmpegError, JobCancelledError } from '../errors';
import { FfmpegProgressTracker } from './progress';

/** Number of trailing stderr lines kept for error reports */
const STDERR_TAIL_LINES = 20;

/**
 * The parts of a child process the processor relies on
 */
export interface SpawnedProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFunction = (command: string, args: string[]) => SpawnedProcess;

const defaultSpawn: SpawnFunction = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

export interface FFmpegRunOptions {
  /** Called with a 0-1 completion ratio */
  onProgress?: (ratio: number) => void;
  /** Called for every stderr line */
  onLine?: (line: string) => void;
  /** Aborting kills ffmpeg and rejects with JobCancelledError */
  signal?: AbortSignal;
  /** Input duration in seconds; read from ffmpeg's output when omitted */
  duration?: number | null;
}

export interface FFmpegRunResult {
  exitCode: number;
  stderrTail: string;
}

export interface FFmpegProcessorOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  spawn?: SpawnFunction;
}

/**
 * Splits a text stream into lines. ffmpeg ends progress lines with a bare \r.
 */
function onLines(stream: Readable | null, listener: (line: string) => void): () => void {
  let pending = '';
  stream?.setEncoding('utf-8');
  stream?.on('data', (chunk: string) => {
    const parts = (pending + chunk).split(/\r\n|\r|\n/);
    pending = parts.pop() ?? '';
    for (const part of parts) {
      if (part.trim()) listener(part);
    }
  });

  return () => {
    if (pending.trim()) listener(pending);
    pending = '';
  };
}

/**
 * FFmpeg wrapper for burning subtitles
 */
export class FFmpegProcessor {
  readonly ffmpegPath: string;
  readonly ffprobePath: string;
  private spawnProcess: SpawnFunction;

  constructor(options: FFmpegProcessorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? (config.ffmpegPath || 'ffmpeg');
    this.ffprobePath = options.ffprobePath ?? config.ffprobePath;
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  /**
   * Checks if FFmpeg is available in the system
   */
  isAvailable(): boolean {
    return this.getVersion() !== null;
  }

  /**
   * Gets the FFmpeg version string
   * @returns Version string or null if not available
   */
  getVersion(): string | null {
    try {
      const output = execFileSync(this.ffmpegPath, ['-version'], {
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'ignore'],
        windowsHide: true,
      });
      const match = output.match(/ffmpeg version ([^\s]+)/);
      return match?.[1] ?? 'unknown';
    } catch {
      return null;
    }
  }

  /**
   * Gets video duration in seconds through ffprobe
   * @returns Duration in seconds, or null when ffprobe cannot tell
   */
  async getDuration(videoPath: string): Promise<number | null> {
    const args = [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      videoPath,
    ];

    try {
      const output = await this.runCommand(this.ffprobePath, args);
      const duration = parseFloat(output.trim());
      return isNaN(duration) ? null : duration;
    } catch (error) {
      console.warn(
        `Could not determine duration for ${videoPath}:`,
        error instanceof Error ? error.message : error
      );
      return null;
    }
  }

  /**
   * Runs ffmpeg, streaming stderr for progress
   * @param args - Arguments after the executable
   * @returns The exit code (always 0) and the last stderr lines
   * @throws FFmpegError on a non-zero exit, or with exit code -1 when ffmpeg cannot start
   * @throws JobCancelledError when `signal` is aborted
   */
  run(args: string[], options: FFmpegRunOptions = {}): Promise<FFmpegRunResult> {
    const { signal, onLine, onProgress } = options;

    return new Promise<FFmpegRunResult>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new JobCancelledError());
        return;
      }

      let child: SpawnedProcess;
      try {
        child = this.spawnProcess(this.ffmpegPath, args);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        reject(new FFmpegError(-1, '', `Failed to start ffmpeg: ${reason}`));
        return;
      }

      const tracker = new FfmpegProgressTracker(options.duration);
      const tail: string[] = [];
      let cancelled = false;
      let settled = false;

      const onAbort = (): void => {
        cancelled = true;
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const flush = onLines(child.stderr, (line) => {
        tail.push(line);
        if (tail.length > STDERR_TAIL_LINES) tail.shift();
        onLine?.(line);
        const ratio = tracker.push(line);
        if (ratio !== null) onProgress?.(ratio);
      });
      child.stdout?.resume();

      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        finish();
      };

      child.on('error', (error) => {
        settle(() =>
          reject(new FFmpegError(-1, tail.join('\n'), `Failed to start ffmpeg: ${error.message}`))
        );
      });

      child.on('close', (code, exitSignal) => {
        flush();
        const stderrTail = tail.join('\n');
        settle(() => {
          if (cancelled) {
            reject(new JobCancelledError());
          } else if (code === 0) {
            onProgress?.(1);
            resolve({ exitCode: 0, stderrTail });
          } else if (code === null) {
            reject(new FFmpegError(-1, stderrTail, `ffmpeg was terminated by ${exitSignal ?? 'a signal'}`));
          } else {
            reject(new FFmpegError(code, stderrTail));
          }
        });
      });
    });
  }

  /**
   * Runs a command with the given arguments
   * @returns Promise that resolves with stdout when command completes
   */
  private runCommand(command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = this.spawnProcess(command, args);

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new Error(`Command failed with code ${code}: ${stderr}`));
        }
      });

      child.on('error', (err) => {
        reject(new Error(`Failed to start command: ${err.message}`));
      });
    });
  }
}
