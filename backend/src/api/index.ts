import { Router } from 'express';
import jobsRouter from './jobs';
import uploadRouter from './upload';
import healthRouter from './health';
import settingsRouter from './settings';
import subtitlesRouter from './subtitles';

const router = Router();

router.use('/jobs', jobsRouter);
router.use('/upload', uploadRouter);
router.use('/health', healthRouter);
router.use('/settings', settingsRouter);
router.use('/subtitles', subtitlesRouter);

export default router;
