import { Router, type NextFunction, type Request, type Response } from 'express';
import type { NlQueryService } from './nl-query.service.js';
import { createQueryController, type QueryControllerOptions } from './query.controller.js';

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error middleware.
const forward =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export function createQueryRouter(service: NlQueryService, options: QueryControllerOptions): Router {
  const router = Router();
  const controller = createQueryController(service, options);

  /**
   * POST /api/nl-query/ask
   * Natural-language question to validated SQL and its result rows.
   */
  router.post('/ask', forward(controller.ask));

  /**
   * POST /api/nl-query/search
   * Rank stored table schemas against a query.
   */
  router.post('/search', forward(controller.search));

  /**
   * POST /api/nl-query/refresh
   * Re-read schemas from the database and rebuild the index.
   */
  router.post('/refresh', forward(controller.refresh));

  router.get('/schemas', controller.listSchemas);
  router.get('/tables/:table/sample', forward(controller.sample));
  router.get('/stats', controller.stats);

  return router;
}
