import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { CancellationPort, ShipmentCommandPort } from '@cargotrace/domain';
import { actorOf } from '../middleware/actor.js';
import {
  createShipmentSchema,
  paginationSchema,
  param,
  shipmentStatusSchema,
  stopSchema,
  stopStatusSchema,
} from './request.js';

const listQuerySchema = z.object({
  status: shipmentStatusSchema.optional(),
  customerId: z.string().optional(),
  carrierId: z.string().optional(),
  ...paginationSchema,
});

const reasonSchema = z.object({ reason: z.string().min(1) });

const deliverSchema = z.object({ deliveryTime: z.coerce.date().optional() });

const cancelSchema = z.object({
  reason: z.string().min(1),
  refund: z
    .object({
      amount: z.number().positive(),
      currency: z.string().length(3),
    })
    .optional(),
});

const etaSchema = z.object({ estimatedDeliveryTime: z.coerce.date() });

const stopStatusBodySchema = z.object({ status: stopStatusSchema });

export function shipmentsRouter(deps: {
  shipments: ShipmentCommandPort;
  cancellation: CancellationPort;
}): Router {
  const { shipments, cancellation } = deps;
  const router = Router();

  /** POST /api/shipments */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createShipmentSchema.parse(req.body);
      res.status(201).json(await shipments.create(body, actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/shipments */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = await shipments.list(query);
      res.json({ data, total: data.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/shipments/by-number/:number */
  router.get('/by-number/:number', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.getByNumber(param(req, 'number')));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/shipments/:id */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.get(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/shipments/:id - hard delete */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await shipments.delete(param(req, 'id'));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  router.post('/:id/confirm', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.confirm(param(req, 'id'), actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/dispatch', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.dispatch(param(req, 'id'), actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/start-transit', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.startTransit(param(req, 'id'), actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/exception', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { reason } = reasonSchema.parse(req.body);
      res.json(await shipments.raiseException(param(req, 'id'), reason, actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/resolve', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.resolveException(param(req, 'id'), actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/deliver', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deliveryTime } = deliverSchema.parse(req.body ?? {});
      res.json(await shipments.deliver(param(req, 'id'), deliveryTime ?? new Date(), actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/shipments/:id/cancel - runs the cancellation saga; responds with its record */
  router.post('/:id/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = cancelSchema.parse(req.body);
      const saga = await cancellation.cancel(param(req, 'id'), { ...body, actor: actorOf(req) });
      res.json(saga);
    } catch (err) {
      next(err);
    }
  });

  router.patch('/:id/estimated-delivery', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { estimatedDeliveryTime } = etaSchema.parse(req.body);
      res.json(
        await shipments.updateEstimatedDelivery(param(req, 'id'), estimatedDeliveryTime, actorOf(req)),
      );
    } catch (err) {
      next(err);
    }
  });

  // ─── Stops ──────────────────────────────────────────────────────────────────

  router.post('/:id/stops', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const stop = stopSchema.parse(req.body);
      res.status(201).json(await shipments.addStop(param(req, 'id'), stop, actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id/stops/:stopId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await shipments.removeStop(param(req, 'id'), param(req, 'stopId'), actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.patch('/:id/stops/:stopId/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = stopStatusBodySchema.parse(req.body);
      res.json(
        await shipments.updateStopStatus(param(req, 'id'), param(req, 'stopId'), status, actorOf(req)),
      );
    } catch (err) {
      next(err);
    }
  });

  return router;
}
