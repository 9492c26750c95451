import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { HttpError } from './core/errors.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import type { NlQueryService } from './modules/query/nl-query.service.js';
import { createQueryRouter } from './modules/query/query.routes.js';

export interface AppOptions {
  service: NlQueryService;
  corsOrigin: string | string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  defaultTopK: number;
  sampleRowLimit: number;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: options.corsOrigin,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type']
    })
  );
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: options.rateLimitWindowMs,
    max: options.rateLimitMaxRequests,
    standardHeaders: true,
    legacyHeaders: false
  });

  app.use(
    '/api/nl-query',
    limiter,
    createQueryRouter(options.service, {
      defaultTopK: options.defaultTopK,
      sampleRowLimit: options.sampleRowLimit
    })
  );

  app.use((req, _res, next) => {
    next(new HttpError(404, `Route ${req.method} ${req.path} not found`));
  });

  // Error middleware MUST be the last one added
  app.use(errorMiddleware);

  return app;
}
