import { Router, Request, Response } from 'express';
import { findSiblingSubtitle, jobStore, getJobSubtitlePath } from '../jobs';
import { isRecord, readCsvMapping, settingsStore } from '../settings';
import {
  detectSubtitleFormat,
  guessCsvMapping,
  loadSubtitleFile,
  PREVIEW_LINE_LIMIT,
  readCsvHeader,
} from '../subtitles';
import { asyncHandler } from './middleware';
import { BadRequestError } from './requestParsers';

const router = Router();

/**
 * Finds the subtitle file a request refers to: `{ path }` for a server-side
 * file or `{ jobId }` for a job's subtitle
 */
async function resolveSubtitlePath(body: unknown): Promise<string> {
  if (!isRecord(body)) {
    throw new BadRequestError('Body must be an object');
  }
  if (typeof body.path === 'string' && body.path.trim()) {
    return body.path.trim();
  }
  if (typeof body.jobId === 'string') {
    const job = await jobStore.get(body.jobId);
    const subtitlePath = job ? getJobSubtitlePath(job) : null;
    if (!subtitlePath) {
      throw new BadRequestError('Job has no subtitle file');
    }
    return subtitlePath;
  }
  throw new BadRequestError('path or jobId is required');
}

/**
 * POST /api/subtitles/preview
 * Parse a subtitle file and return its first lines
 */
router.post(
  '/preview',
  asyncHandler(async (req: Request, res: Response) => {
    const subtitlePath = await resolveSubtitlePath(req.body);
    const body: unknown = req.body;
    const requested = isRecord(body) ? readCsvMapping(body.csvMapping) : null;
    const csvMapping = requested ?? settingsStore.getCsvMapping(subtitlePath) ?? null;

    const { format, lines } = loadSubtitleFile(subtitlePath, { csvMapping });
    res.json({
      format,
      lineCount: lines.length,
      lines: lines.slice(0, PREVIEW_LINE_LIMIT),
    });
  })
);

/**
 * POST /api/subtitles/match
 * Suggest the subtitle beside a server-side video: `<stem>.srt`, `.ass`, `.ssa` or `.csv`
 */
router.post(
  '/match',
  asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.videoPath !== 'string' || !body.videoPath.trim()) {
      throw new BadRequestError('videoPath is required');
    }
    res.json({ subtitlePath: findSiblingSubtitle(body.videoPath.trim()) });
  })
);

/**
 * POST /api/subtitles/csv-columns
 * Header of a CSV subtitle file with the saved or guessed column mapping
 */
router.post(
  '/csv-columns',
  asyncHandler(async (req: Request, res: Response) => {
    const subtitlePath = await resolveSubtitlePath(req.body);
    if (detectSubtitleFormat(subtitlePath) !== 'csv') {
      throw new BadRequestError('Not a CSV subtitle file');
    }

    const columns = readCsvHeader(subtitlePath);
    const saved = settingsStore.getCsvMapping(subtitlePath) ?? null;
    res.json({ columns, mapping: saved ?? guessCsvMapping(columns), saved: saved !== null });
  })
);

export default router;
