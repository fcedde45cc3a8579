import { Router, Request, Response } from 'express';
import { FFmpegProcessor } from '../video';
import { config } from '../config';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  const ffmpeg = new FFmpegProcessor();
  const ffmpegVersion = ffmpeg.getVersion();

  res.json({
    status: ffmpegVersion !== null ? 'healthy' : 'degraded',
    services: {
      ffmpeg: {
        available: ffmpegVersion !== null,
        version: ffmpegVersion,
        path: ffmpeg.ffmpegPath,
      },
    },
    config: {
      settingsPath: config.settingsPath,
      maxFileSize: config.maxFileSize,
    },
  });
});

export default router;
