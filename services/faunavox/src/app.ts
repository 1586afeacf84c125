import express, { type NextFunction, type Request, type Response } from 'express';
import { createMasterApiKeyMiddleware } from './middleware/masterApiKey.js';
import { sendError, sendFailure } from './middleware/errorResponse.js';
import { createArtifactsRouter } from './routes/artifacts.js';
import { createHealthRouter } from './routes/health.js';
import { createHelpRouter } from './routes/help.js';
import { createJobsRouter } from './routes/jobs.js';
import { createSpeciesRouter } from './routes/species.js';
import type { AppContext } from './types/appContext.js';

function bodyParserErrorType(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('type' in error)) return null;
  return typeof error.type === 'string' ? error.type : null;
}

export function createApp(ctx: AppContext, masterApiKey: string): express.Express {
  const app = express();
  const requireGateway = createMasterApiKeyMiddleware(masterApiKey);

  app.use(createHelpRouter(ctx));
  app.use(createHealthRouter(ctx));
  app.use(createSpeciesRouter(ctx));
  app.use(requireGateway, createArtifactsRouter(ctx));
  app.use(requireGateway, createJobsRouter(ctx));

  app.use((req, res) => {
    sendError(res, 404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (bodyParserErrorType(error) === 'entity.too.large') {
      sendError(res, 413, 'FILE_TOO_LARGE', `Audio file exceeds maximum allowed size of ${ctx.settings.maxUploadBytes} bytes`, {
        max_bytes: ctx.settings.maxUploadBytes,
      });
      return;
    }
    sendFailure(res, error, 'Request failed');
  });

  return app;
}
