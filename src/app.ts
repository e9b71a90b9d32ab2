import express, { Express, Request, Response } from 'express';

import type { RowBatcher } from './lib/etl/loader';
import { requestIdMiddleware } from './middleware/request_id';

export type AppDeps = {
  batcher: Pick<RowBatcher, 'size'>;
};

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);

  app.get('/healthz', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      pending_rows: deps.batcher.size,
      request_id: req.request_id
    });
  });

  return app;
}
