/**
 * Error codes surfaced to the GUI and the CLI
 */
export type SubBurnErrorCode =
  | 'INPUT_FILE'
  | 'SUBTITLE_PARSE'
  | 'STYLE_INVALID'
  | 'FFMPEG_FAILED'
  | 'CANCELLED';

/**
 * Base class for every failure SubBurn reports to the user
 */
export class SubBurnError extends Error {
  readonly code: SubBurnErrorCode;

  constructor(code: SubBurnErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A video or subtitle file is missing, unreadable or of an unsupported type
 */
export class InputFileError extends SubBurnError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super('INPUT_FILE', `${reason}: ${filePath}`);
    this.filePath = filePath;
  }
}

export class SubtitleParseError extends SubBurnError {
  constructor(message: string) {
    super('SUBTITLE_PARSE', message);
  }
}

export class StyleValidationError extends SubBurnError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('STYLE_INVALID', `Invalid ${field}: ${message}`);
    this.field = field;
  }
}

/**
 * ffmpeg exited with a non-zero code or could not be started.
 * `stderrTail` holds the last lines ffmpeg printed, which carry its own error text.
 */
export class FFmpegError extends SubBurnError {
  readonly exitCode: number;
  readonly stderrTail: string;

  constructor(exitCode: number, stderrTail: string, message?: string) {
    super('FFMPEG_FAILED', message ?? `ffmpeg exited with code ${exitCode}`);
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

export class JobCancelledError extends SubBurnError {
  constructor() {
    super('CANCELLED', 'Processing was cancelled');
  }
}

/**
 * Errors caused by what the user supplied rather than by the environment
 */
export function isUserInputError(error: unknown): boolean {
  return (
    error instanceof SubBurnError &&
    (error.code === 'INPUT_FILE' || error.code === 'SUBTITLE_PARSE' || error.code === 'STYLE_INVALID')
  );
}

/**
 * Builds the text shown to the user for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof FFmpegError) {
    return error.stderrTail ? `${error.message}\n${error.stderrTail}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}
