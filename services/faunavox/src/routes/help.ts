import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHelpRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/help', (_req, res) => {
    res.json({
      service: 'faunavox',
      version: '0.1.0',
      summary: 'Upload animal vocalizations, then poll for quality-gated interpretations.',
      base_url: ctx.settings.publicBaseUrl,
      quickstart: [
        '1) GET /v1/species -> pick a species id',
        '2) POST /v1/artifacts?species=<id>&format=wav with the raw audio body',
        '3) POST /v1/artifacts/{artifact_id}/analysis -> job handle',
        '4) Poll GET /v1/artifacts/{artifact_id}/result until it returns 200',
      ],
      auth: {
        caller_header: 'x-caller-id: <caller id set by your gateway>',
        ...(ctx.settings.gatewayKeyRequired
          ? {
              gateway_header: 'x-api-key: <MASTER_API_KEY>',
              gateway_note: 'Operator-level gate enabled in this deployment.',
            }
          : {}),
      },
      lifecycle: {
        job_states: ['uploaded', 'quality_checked', 'rejected', 'dispatched', 'succeeded', 'partial', 'failed'],
        terminal_states: ['rejected', 'succeeded', 'partial', 'failed'],
        partial_when: 'confidence below the accuracy floor, or noisy/overlapping audio',
        cancel: 'POST /v1/jobs/{job_id}/cancel',
      },
      limits: {
        max_upload_bytes: ctx.settings.maxUploadBytes,
        formats: ctx.pipeline.listSupportedFormats(),
      },
    });
  });

  return router;
}
