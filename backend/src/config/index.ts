import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // File paths
  dataDir: string;
  uploadsDir: string;
  outputsDir: string;
  jobsDir: string;
  tempDir: string;
  settingsPath: string;

  // Processing
  maxFileSize: number;
  ffmpegPath: string;
  ffprobePath: string;
  verbose: boolean;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Location of the persisted style settings.
 * Windows keeps them under %APPDATA%, everything else under ~/.config.
 */
export function defaultSettingsPath(): string {
  const base =
    process.platform === 'win32'
      ? getEnvString('APPDATA', os.homedir())
      : path.join(os.homedir(), '.config');
  const appDir = process.platform === 'win32' ? 'SubBurn' : 'subburn';
  return path.join(base, appDir, 'settings.json');
}

/**
 * ffprobe normally lives next to ffmpeg under the same naming scheme
 */
export function deriveFfprobePath(ffmpegPath: string): string {
  const fileName = path.basename(ffmpegPath);
  const dirPrefix = ffmpegPath.slice(0, ffmpegPath.length - fileName.length);
  return dirPrefix + fileName.replace(/ffmpeg/i, 'ffprobe');
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');
  const ffmpegPath = getEnvString('FFMPEG_PATH', 'ffmpeg');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // File paths
    dataDir,
    uploadsDir: getEnvString('UPLOADS_DIR', `${dataDir}/uploads`),
    outputsDir: getEnvString('OUTPUTS_DIR', `${dataDir}/outputs`),
    jobsDir: getEnvString('JOBS_DIR', `${dataDir}/jobs`),
    tempDir: getEnvString('TEMP_DIR', path.join(os.tmpdir(), 'subburn')),
    settingsPath: getEnvString('SETTINGS_PATH', defaultSettingsPath()),

    // Processing
    maxFileSize: getEnvNumber('MAX_FILE_SIZE', 4294967296), // 4GB
    ffmpegPath,
    ffprobePath: getEnvString('FFPROBE_PATH', deriveFfprobePath(ffmpegPath)),
    verbose: getEnvBoolean('SUBBURN_VERBOSE', false),
  };
}

export const config = loadConfig();
