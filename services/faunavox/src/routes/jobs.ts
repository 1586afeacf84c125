import { type Response, Router } from 'express';
import { createRequireCaller } from '../middleware/callerIdentity.js';
import { sendFailure } from '../middleware/errorResponse.js';
import type { AnalysisJobRecord } from '../types/analysis.js';
import type { AppContext } from '../types/appContext.js';
import { loadOwnedArtifact } from './artifacts.js';

async function loadOwnedJob(ctx: AppContext, res: Response, jobId: string): Promise<AnalysisJobRecord | null> {
  const job = await ctx.pipeline.getJob(jobId);
  const artifact = await loadOwnedArtifact(ctx, res, job.artifact_id);
  return artifact ? job : null;
}

export function createJobsRouter(ctx: AppContext): Router {
  const router = Router();

  router.use('/v1/jobs', createRequireCaller());

  router.get('/v1/jobs/:id', async (req, res) => {
    try {
      const job = await loadOwnedJob(ctx, res, req.params.id);
      if (!job) return;
      res.json(job);
    } catch (error) {
      sendFailure(res, error, 'Failed to load job');
    }
  });

  router.post('/v1/jobs/:id/cancel', async (req, res) => {
    try {
      const job = await loadOwnedJob(ctx, res, req.params.id);
      if (!job) return;
      res.json(await ctx.pipeline.cancelJob(job.id));
    } catch (error) {
      sendFailure(res, error, 'Failed to cancel job');
    }
  });

  return router;
}
