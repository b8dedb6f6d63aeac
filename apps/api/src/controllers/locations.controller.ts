import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type {
  LocationIngestionPort,
  LocationMaintenancePort,
  LocationQueryPort,
} from '@cargotrace/domain';
import { param } from './request.js';

const MAX_BATCH = 1000;

// Ranges are left to the tracker so bad coordinates surface as INVALID_LOCATION_DATA.
const reportSchema = z.object({
  shipmentId: z.string(),
  deviceId: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  timestamp: z.coerce.date(),
  altitude: z.number().optional(),
  speed: z.number().optional(),
  heading: z.number().optional(),
  accuracy: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const batchSchema = z.object({ reports: z.array(reportSchema).min(1).max(MAX_BATCH) });

const rangeQuerySchema = z.object({ from: z.coerce.date(), to: z.coerce.date() });
const dailyQuerySchema = z.object({ date: z.string() });
const dateRangeQuerySchema = z.object({ fromDate: z.string(), toDate: z.string() });

const nearbyQuerySchema = z.object({
  lat: z.coerce.number(),
  lng: z.coerce.number(),
  radiusKm: z.coerce.number().default(10),
  sinceMinutes: z.coerce.number().int().positive().optional(),
});

const movingQuerySchema = z.object({
  sinceMinutes: z.coerce.number().int().positive().default(15),
});

const archiveSchema = z.object({ daysToKeep: z.number().int().positive() });

export function locationsRouter(deps: {
  tracker: LocationIngestionPort & LocationQueryPort & LocationMaintenancePort;
}): Router {
  const { tracker } = deps;
  const router = Router();

  /** POST /api/locations - single position report */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const report = reportSchema.parse(req.body);
      res.status(201).json(await tracker.update(report));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/locations/batch - applied in order; stale/invalid reports are counted */
  router.post('/batch', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { reports } = batchSchema.parse(req.body);
      res.json(await tracker.ingestBatch(reports));
    } catch (err) {
      next(err);
    }
  });

  router.get('/shipments/:id/latest', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tracker.getLatest(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  router.get('/shipments/:id/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { from, to } = rangeQuerySchema.parse(req.query);
      res.json({ data: await tracker.getHistory(param(req, 'id'), from, to) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/shipments/:id/history/daily', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { date } = dailyQuerySchema.parse(req.query);
      res.json(await tracker.getDailyHistory(param(req, 'id'), date));
    } catch (err) {
      next(err);
    }
  });

  router.get('/shipments/:id/history/range', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { fromDate, toDate } = dateRangeQuerySchema.parse(req.query);
      res.json({ data: await tracker.getHistoryRange(param(req, 'id'), fromDate, toDate) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/locations/nearby?lat=&lng=&radiusKm=&sinceMinutes= */
  router.get('/nearby', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const q = nearbyQuerySchema.parse(req.query);
      const since =
        q.sinceMinutes === undefined ? undefined : new Date(Date.now() - q.sinceMinutes * 60_000);
      res.json({ data: await tracker.findNearby({ lat: q.lat, lng: q.lng }, q.radiusKm, since) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/moving', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sinceMinutes } = movingQuerySchema.parse(req.query);
      res.json({ data: await tracker.getMoving(sinceMinutes) });
    } catch (err) {
      next(err);
    }
  });

  /** PUT /api/locations/:id/enrich - reverse geocode a stored report */
  router.put('/:id/enrich', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ address: await tracker.enrichWithAddress(param(req, 'id')) });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/shipments/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tracker.deleteHistory(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  router.post('/archive', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { daysToKeep } = archiveSchema.parse(req.body);
      res.json(await tracker.archive(daysToKeep));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
