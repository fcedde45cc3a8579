import fs from 'fs';
import path from 'path';
import { SUBTITLE_EXTENSIONS } from '../subtitles';
import { isVideoPath } from '../video';

export interface BatchPair {
  videoPath: string;
  subtitlePath: string;
}

export interface BatchPlan {
  /** One entry per video that found a subtitle */
  pairs: BatchPair[];
  /** Videos with no subtitle in the batch or beside them */
  unmatched: string[];
  /** Paths that are neither videos nor subtitles */
  ignored: string[];
}

function stemOf(filePath: string): string {
  return path.parse(filePath).name;
}

function isSubtitlePath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() in SUBTITLE_EXTENSIONS;
}

/**
 * Looks for `<stem>.srt`, `.ass`, `.ssa` or `.csv` in the video's folder
 */
export function findSiblingSubtitle(videoPath: string): string | null {
  const parsed = path.parse(videoPath);
  for (const extension of Object.keys(SUBTITLE_EXTENSIONS)) {
    const candidate = path.join(parsed.dir, `${parsed.name}${extension}`);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Pairs every video in `paths` with a subtitle, in this order of preference:
 * a subtitle in `paths` with the same stem, one with that stem beside the video,
 * then the first subtitle in `paths`.
 */
export function planBatch(paths: string[]): BatchPlan {
  const unique = [...new Set(paths.map((p) => p.trim()).filter(Boolean))];
  const videos = unique.filter(isVideoPath);
  const subtitles = unique.filter(isSubtitlePath);
  const ignored = unique.filter((p) => !isVideoPath(p) && !isSubtitlePath(p));

  const pairs: BatchPair[] = [];
  const unmatched: string[] = [];

  for (const videoPath of videos) {
    const subtitlePath =
      subtitles.find((candidate) => stemOf(candidate) === stemOf(videoPath)) ??
      findSiblingSubtitle(videoPath) ??
      subtitles[0];

    if (subtitlePath) {
      pairs.push({ videoPath, subtitlePath });
    } else {
      unmatched.push(videoPath);
    }
  }

  return { pairs, unmatched, ignored };
}
