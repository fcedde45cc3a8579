import multer from 'multer';
import { isUserInputError, StyleValidationError } from '../errors';
import { JobConfig } from '../jobs/types';
import {
  AppSettingsPatch,
  applyStyleOverrides,
  CsvMapping,
  DEFAULT_PRESET,
  DEFAULT_STYLE,
  ENCODER_PRESETS,
  EncoderPreset,
  isEncoderPreset,
  isRecord,
  readCsvMapping,
  readStyleOverrides,
  StyleOverrides,
  validateEncoder,
  validateStyle,
} from '../settings';
import { detectSubtitleFormat } from '../subtitles';

/**
 * Request body that cannot be turned into a valid command
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new BadRequestError(`${key} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function optionalNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (isNaN(parsed)) {
    throw new BadRequestError(`${key} must be a number`);
  }
  return parsed;
}

function optionalPreset(source: Record<string, unknown>, key: string): EncoderPreset | undefined {
  const value = source[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (!isEncoderPreset(value)) {
    throw new StyleValidationError('preset', `"${String(value)}" is not one of ${ENCODER_PRESETS.join(', ')}`);
  }
  return value;
}

/**
 * Checks style overrides against the defaults so a bad value fails when the job
 * is created rather than when it runs
 */
function checkStyleOverrides(overrides: StyleOverrides): StyleOverrides {
  const style = validateStyle(applyStyleOverrides(DEFAULT_STYLE, overrides));
  const normalized: StyleOverrides = { ...overrides };
  if (overrides.fontColor !== undefined) normalized.fontColor = style.fontColor;
  if (overrides.outlineColor !== undefined) normalized.outlineColor = style.outlineColor;
  if (overrides.fontFamily !== undefined) normalized.fontFamily = style.fontFamily;
  return normalized;
}

function parseCsvMappingField(value: unknown): CsvMapping | null {
  if (value === undefined || value === null) return null;
  const mapping = readCsvMapping(value);
  if (!mapping) {
    throw new BadRequestError('csvMapping needs startColumn and textColumn');
  }
  return mapping;
}

/**
 * Reads the `config` of a POST /api/jobs body
 * @throws BadRequestError or StyleValidationError for unusable values
 */
export function parseJobConfig(body: unknown): JobConfig {
  if (!isRecord(body) || !isRecord(body.config)) {
    throw new BadRequestError('Missing config');
  }
  const source = body.config;

  const subtitlePath = optionalString(source, 'subtitlePath');
  if (subtitlePath) {
    detectSubtitleFormat(subtitlePath);
  }

  const crf = optionalNumber(source, 'crf');
  const preset = optionalPreset(source, 'preset');
  if (crf !== undefined) {
    validateEncoder({ crf, preset: preset ?? DEFAULT_PRESET });
  }

  if (source.codecCopy !== undefined && typeof source.codecCopy !== 'boolean') {
    throw new BadRequestError('codecCopy must be a boolean');
  }
  const codecCopy = typeof source.codecCopy === 'boolean' ? source.codecCopy : true;

  const jobConfig: JobConfig = {
    styleOverrides: checkStyleOverrides(readStyleOverrides(source.styleOverrides)),
    codecCopy,
    csvMapping: parseCsvMappingField(source.csvMapping),
  };

  const name = optionalString(source, 'name');
  const videoPath = optionalString(source, 'videoPath');
  const outputPath = optionalString(source, 'outputPath');
  if (name) jobConfig.name = name;
  if (videoPath) jobConfig.videoPath = videoPath;
  if (subtitlePath) jobConfig.subtitlePath = subtitlePath;
  if (outputPath) jobConfig.outputPath = outputPath;
  if (crf !== undefined) jobConfig.crf = crf;
  if (preset) jobConfig.preset = preset;

  return jobConfig;
}

export interface BatchRequest {
  paths: string[];
  /** Settings shared by every job of the batch */
  config: JobConfig;
  start: boolean;
}

/**
 * Reads a POST /api/jobs/batch body: `{ paths, config?, start? }`.
 * Videos and subtitles come from `paths`, so the shared config names neither,
 * nor an output file.
 */
export function parseBatchRequest(body: unknown): BatchRequest {
  if (!isRecord(body)) {
    throw new BadRequestError('Body must be an object');
  }

  const rawPaths = body.paths;
  if (!Array.isArray(rawPaths) || rawPaths.length === 0) {
    throw new BadRequestError('paths must be a non-empty list');
  }
  const paths: string[] = [];
  for (const entry of rawPaths) {
    if (typeof entry !== 'string') {
      throw new BadRequestError('paths must only contain strings');
    }
    if (entry.trim()) paths.push(entry.trim());
  }

  const shared = parseJobConfig({ config: body.config ?? {} });
  if (shared.videoPath || shared.subtitlePath || shared.outputPath) {
    throw new BadRequestError('A batch config cannot name a video, subtitle or output path');
  }

  const start = body.start === undefined ? true : body.start;
  if (typeof start !== 'boolean') {
    throw new BadRequestError('start must be a boolean');
  }

  return { paths, config: shared, start };
}

/**
 * Reads a PUT /api/settings body. Values are validated by the settings store.
 */
export function parseSettingsPatch(body: unknown): AppSettingsPatch {
  if (!isRecord(body)) {
    throw new BadRequestError('Settings must be an object');
  }

  const patch: AppSettingsPatch = {};
  if (body.font !== undefined) {
    if (!isRecord(body.font)) {
      throw new BadRequestError('font must be an object');
    }
    patch.font = readStyleOverrides(body.font);
  }

  const crf = optionalNumber(body, 'crf');
  const preset = optionalPreset(body, 'preset');
  if (crf !== undefined) patch.crf = crf;
  if (preset) patch.preset = preset;

  if (body.outputDir !== undefined) {
    if (typeof body.outputDir !== 'string') {
      throw new BadRequestError('outputDir must be a string');
    }
    patch.outputDir = body.outputDir.trim();
  }

  return patch;
}

/**
 * Reads a PUT /api/settings/csv-mappings body: `{ path, mapping }`
 */
export function parseCsvMappingRequest(body: unknown): { path: string; mapping: CsvMapping } {
  if (!isRecord(body)) {
    throw new BadRequestError('Body must be an object');
  }
  const filePath = optionalString(body, 'path');
  if (!filePath) {
    throw new BadRequestError('path is required');
  }
  const mapping = parseCsvMappingField(body.mapping);
  if (!mapping) {
    throw new BadRequestError('mapping is required');
  }
  return { path: filePath, mapping };
}

/**
 * HTTP status for an error raised while handling a request
 */
export function errorStatus(error: unknown): number {
  if (error instanceof BadRequestError || isUserInputError(error)) return 400;
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }
  return 500;
}
