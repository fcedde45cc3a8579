import path from 'path';

/** Suffix added to the video file name for the subtitled copy */
export const OUTPUT_SUFFIX = '_sub';

/**
 * Derives `<dir>/<stem>_sub<ext>` from the input video path.
 * `outputDir` replaces the video's own directory when given.
 */
export function deriveOutputPath(videoPath: string, outputDir?: string): string {
  const parsed = path.parse(videoPath);
  const dir = outputDir ? outputDir : parsed.dir;
  return path.join(dir, `${parsed.name}${OUTPUT_SUFFIX}${parsed.ext}`);
}
