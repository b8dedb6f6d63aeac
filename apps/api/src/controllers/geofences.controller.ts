import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { GeofenceService } from '../services/geofences/geofence.service.js';
import { latitude, longitude, param } from './request.js';

const point = z.object({ lat: latitude, lng: longitude });

const shapeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('circle'), center: point, radiusMeters: z.number() }),
  z.object({ kind: z.literal('polygon'), vertices: z.array(point) }),
]);

const createSchema = z.object({
  name: z.string().min(1),
  ownerId: z.string().min(1),
  shape: shapeSchema,
  tags: z.array(z.string()).optional(),
  notification: z
    .object({
      notifyOnEntry: z.boolean(),
      notifyOnExit: z.boolean(),
      notifyOnDwell: z.boolean(),
      dwellThresholdMinutes: z.number(),
    })
    .partial()
    .optional(),
  priority: z.number().int().optional(),
  active: z.boolean().optional(),
});

const listQuerySchema = z.object({
  ownerId: z.string().optional(),
  active: z.enum(['true', 'false']).transform((v) => v === 'true').optional(),
});

const radiusSchema = z.object({ radiusMeters: z.number() });

export function geofencesRouter(deps: { geofences: GeofenceService }): Router {
  const { geofences } = deps;
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json(await geofences.create(createSchema.parse(req.body)));
    } catch (err) {
      next(err);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await geofences.list(listQuerySchema.parse(req.query));
      res.json({ data, total: data.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await geofences.get(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/activate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await geofences.activate(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/deactivate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await geofences.deactivate(param(req, 'id')));
    } catch (err) {
      next(err);
    }
  });

  router.patch('/:id/radius', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { radiusMeters } = radiusSchema.parse(req.body);
      res.json(await geofences.updateRadius(param(req, 'id'), radiusMeters));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
