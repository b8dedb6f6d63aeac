import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { CancellationPort } from '@cargotrace/domain';
import { param } from './request.js';

export function sagasRouter(deps: { cancellation: CancellationPort }): Router {
  const { cancellation } = deps;
  const router = Router();

  /** POST /api/sagas/recover - compensate sagas a crashed process left unfinished */
  router.post('/recover', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await cancellation.recover();
      res.json({ data, total: data.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await cancellation.getSaga(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
