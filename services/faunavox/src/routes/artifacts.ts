import express, { type Request, type Response, Router } from 'express';
import { DuplicateActiveJobError } from '../core/errors.js';
import { callerIdOf, createRequireCaller } from '../middleware/callerIdentity.js';
import { sendError, sendFailure } from '../middleware/errorResponse.js';
import type { AudioArtifactRecord, UploadInput } from '../types/analysis.js';
import type { AppContext } from '../types/appContext.js';

const MAX_METADATA_LENGTH = 500;

const CONTENT_TYPE_FORMATS: Record<string, string> = {
  'audio/wav': 'wav',
  'audio/wave': 'wav',
  'audio/x-wav': 'wav',
  'audio/vnd.wave': 'wav',
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/flac': 'flac',
  'audio/x-flac': 'flac',
};

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function formatFromContentType(req: Request): string | undefined {
  const contentType = (req.header('content-type') || '').split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_FORMATS[contentType];
}

export function parseUploadRequest(
  req: Request,
  ownerId: string,
): { ok: true; value: UploadInput } | { ok: false; message: string } {
  const species = queryString(req, 'species');
  if (!species) {
    return { ok: false, message: 'species query parameter is required' };
  }

  const format = queryString(req, 'format') ?? formatFromContentType(req);
  if (!format) {
    return { ok: false, message: 'format query parameter or an audio content type is required' };
  }

  const body: unknown = req.body;
  const value: UploadInput = {
    bytes: Buffer.isBuffer(body) ? body : Buffer.alloc(0),
    format,
    species,
    ownerId,
  };

  const filename = queryString(req, 'filename');
  if (filename) {
    if (filename.length > MAX_METADATA_LENGTH) {
      return { ok: false, message: `filename exceeds max length of ${MAX_METADATA_LENGTH} characters` };
    }
    value.originalFilename = filename;
  }

  const location = queryString(req, 'location');
  if (location) {
    if (location.length > MAX_METADATA_LENGTH) {
      return { ok: false, message: `location exceeds max length of ${MAX_METADATA_LENGTH} characters` };
    }
    value.location = location;
  }

  const recordedAt = queryString(req, 'recorded_at');
  if (recordedAt) {
    const timestamp = Date.parse(recordedAt);
    if (Number.isNaN(timestamp)) {
      return { ok: false, message: 'recorded_at must be an ISO 8601 timestamp' };
    }
    value.recordedAt = new Date(timestamp).toISOString();
  }

  return { ok: true, value };
}

/**
 * Loads an artifact the caller owns. Sends 401/403/404 and returns null
 * otherwise.
 */
export async function loadOwnedArtifact(
  ctx: AppContext,
  res: Response,
  artifactId: string,
): Promise<AudioArtifactRecord | null> {
  const callerId = callerIdOf(res);
  if (!callerId) {
    sendError(res, 401, 'UNAUTHORIZED', 'Missing authenticated caller');
    return null;
  }

  const artifact = await ctx.pipeline.getArtifact(artifactId);
  if (artifact.owner_id !== callerId) {
    sendError(res, 403, 'FORBIDDEN', 'Artifact does not belong to this caller');
    return null;
  }
  return artifact;
}

export function createArtifactsRouter(ctx: AppContext): Router {
  const router = Router();
  const requireCaller = createRequireCaller();
  const rawAudio = express.raw({ type: () => true, limit: ctx.settings.maxUploadBytes });

  router.use('/v1/artifacts', requireCaller);

  router.post('/v1/artifacts', rawAudio, async (req, res) => {
    const callerId = callerIdOf(res);
    if (!callerId) {
      sendError(res, 401, 'UNAUTHORIZED', 'Missing authenticated caller');
      return;
    }

    const parsed = parseUploadRequest(req, callerId);
    if (!parsed.ok) {
      sendError(res, 400, 'VALIDATION_ERROR', parsed.message);
      return;
    }

    try {
      const artifact = await ctx.pipeline.upload(parsed.value);
      res.status(201).json({
        ...artifact,
        analysis_url: `/v1/artifacts/${artifact.id}/analysis`,
      });
    } catch (error) {
      sendFailure(res, error, 'Failed to store artifact');
    }
  });

  router.get('/v1/artifacts/:id', async (req, res) => {
    try {
      const artifact = await loadOwnedArtifact(ctx, res, req.params.id);
      if (!artifact) return;
      res.json(artifact);
    } catch (error) {
      sendFailure(res, error, 'Failed to load artifact');
    }
  });

  router.post('/v1/artifacts/:id/analysis', async (req, res) => {
    try {
      const artifact = await loadOwnedArtifact(ctx, res, req.params.id);
      if (!artifact) return;

      const handle = await ctx.pipeline.triggerAnalysis(artifact.id);
      const notice = handle.deduplicated ? new DuplicateActiveJobError(handle.job_id) : null;
      res.status(handle.deduplicated ? 200 : 202).json({
        ...handle,
        poll_url: `/v1/artifacts/${artifact.id}/result`,
        ...(notice ? { notice: { code: notice.code, message: notice.message } } : {}),
      });
    } catch (error) {
      sendFailure(res, error, 'Failed to start analysis');
    }
  });

  router.get('/v1/artifacts/:id/result', async (req, res) => {
    try {
      const artifact = await loadOwnedArtifact(ctx, res, req.params.id);
      if (!artifact) return;

      const lookup = await ctx.pipeline.getResult(artifact.id);
      if (lookup.state === 'not_found') {
        sendError(res, 404, 'NOT_FOUND', `Artifact ${artifact.id} not found`);
        return;
      }
      if (lookup.state === 'not_ready') {
        res.status(202).json({
          artifact_id: artifact.id,
          state: 'not_ready',
          status: lookup.status,
          job_id: lookup.job_id,
        });
        return;
      }
      res.json(lookup.report);
    } catch (error) {
      sendFailure(res, error, 'Failed to load result');
    }
  });

  return router;
}
