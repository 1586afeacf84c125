import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createSpeciesRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/v1/species', (_req, res) => {
    const species = ctx.pipeline.listSupportedSpecies();
    res.json({
      species,
      count: species.length,
    });
  });

  router.get('/v1/formats', (_req, res) => {
    res.json({
      formats: ctx.pipeline.listSupportedFormats(),
      max_upload_bytes: ctx.settings.maxUploadBytes,
    });
  });

  return router;
}
