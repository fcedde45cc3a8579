import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { jobStore, UploadedFile } from '../jobs';
import { InputFileError } from '../errors';
import { SUBTITLE_EXTENSIONS } from '../subtitles';
import { VIDEO_EXTENSIONS } from '../video';
import { config } from '../config';
import { asyncHandler } from './middleware';

const router = Router();

/**
 * Configure multer storage
 */
const storage = multer.diskStorage({
  destination: (req, _file, cb) => {
    const jobId = req.params.jobId;
    if (!jobId) {
      cb(new Error('Job ID required'), '');
      return;
    }
    const uploadDir = jobStore.getUploadDir(jobId);
    if (!fs.existsSync(uploadDir)) {
      fs.mkdirSync(uploadDir, { recursive: true });
    }
    cb(null, uploadDir);
  },
  filename: (_req, file, cb) => {
    // Preserve original filename with timestamp prefix to avoid collisions
    const timestamp = Date.now();
    const safeName = file.originalname.replace(/[^a-zA-Z0-9.-]/g, '_');
    cb(null, `${timestamp}_${safeName}`);
  },
});

function createUpload(extensions: string[]): multer.Multer {
  return multer({
    storage,
    limits: {
      fileSize: config.maxFileSize,
    },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (extensions.includes(ext)) {
        cb(null, true);
      } else {
        cb(new InputFileError(file.originalname, 'Unsupported file type'));
      }
    },
  });
}

const videoUpload = createUpload(VIDEO_EXTENSIONS);
const subtitleUpload = createUpload(Object.keys(SUBTITLE_EXTENSIONS));

function describeFile(file: UploadedFile | undefined): { name: string; size: number } | null {
  return file ? { name: file.originalName, size: file.size } : null;
}

/**
 * Stores the uploaded file on the job, replacing and removing an earlier one
 */
function handleUpload(type: 'video' | 'subtitle') {
  return asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.jobId ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'pending') {
      res.status(400).json({ error: 'Cannot upload files after job has started' });
      return;
    }

    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'No file uploaded' });
      return;
    }

    const previous = type === 'video' ? job.videoFile : job.subtitleFile;
    if (previous && previous.path !== file.path && fs.existsSync(previous.path)) {
      fs.unlinkSync(previous.path);
    }

    const uploaded: UploadedFile = {
      originalName: file.originalname,
      storedName: file.filename,
      path: file.path,
      size: file.size,
    };
    await jobStore.setFile(jobId, uploaded, type);
    await jobStore.addLog(jobId, 'info', `Uploaded ${type} ${uploaded.originalName}`);

    res.json({
      message: `${type === 'video' ? 'Video' : 'Subtitle'} file uploaded`,
      file: describeFile(uploaded),
    });
  });
}

/**
 * POST /api/upload/:jobId/video
 * Upload the video for a job
 */
router.post('/:jobId/video', videoUpload.single('file'), handleUpload('video'));

/**
 * POST /api/upload/:jobId/subtitle
 * Upload the subtitle file for a job
 */
router.post('/:jobId/subtitle', subtitleUpload.single('file'), handleUpload('subtitle'));

/**
 * GET /api/upload/:jobId/files
 * List uploaded files for a job
 */
router.get(
  '/:jobId/files',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.jobId ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json({
      video: describeFile(job.videoFile),
      subtitle: describeFile(job.subtitleFile),
    });
  })
);

export default router;
