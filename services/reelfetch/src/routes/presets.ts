import { Router } from 'express';
import type { PresetListResponse } from 'reelfetch-client';
import { PRESET_NAMES, describePreset } from '../core/presets.js';
import type { AppContext } from '../types/appContext.js';

export function createPresetsRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/v1/presets', (_req, res) => {
    const body: PresetListResponse = {
      default_preset: ctx.defaultPreset,
      presets: PRESET_NAMES.map(describePreset),
    };
    res.json(body);
  });

  return router;
}
