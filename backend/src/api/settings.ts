import { Router, Request, Response } from 'express';
import { createDefaultSettings, ENCODER_PRESETS, settingsStore } from '../settings';
import { asyncHandler } from './middleware';
import { parseCsvMappingRequest, parseSettingsPatch } from './requestParsers';

const router = Router();

/**
 * GET /api/settings
 * Persisted style and encoder settings, with the defaults and allowed presets
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    res.json({
      settings: settingsStore.load(),
      defaults: createDefaultSettings(),
      presets: ENCODER_PRESETS,
    });
  })
);

/**
 * PUT /api/settings
 * Validate and save a partial settings change
 */
router.put(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const settings = settingsStore.update(parseSettingsPatch(req.body));
    res.json({ settings });
  })
);

/**
 * POST /api/settings/reset
 * Restore default style and encoder values
 */
router.post(
  '/reset',
  asyncHandler(async (_req: Request, res: Response) => {
    res.json({ settings: settingsStore.reset() });
  })
);

/**
 * PUT /api/settings/csv-mappings
 * Remember the column mapping of a CSV subtitle file
 */
router.put(
  '/csv-mappings',
  asyncHandler(async (req: Request, res: Response) => {
    const { path, mapping } = parseCsvMappingRequest(req.body);
    res.json({ settings: settingsStore.saveCsvMapping(path, mapping) });
  })
);

export default router;
