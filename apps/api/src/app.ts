import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';

import type { Container } from './container.js';
import { shipmentsRouter } from './controllers/shipments.controller.js';
import { locationsRouter } from './controllers/locations.controller.js';
import { geofencesRouter } from './controllers/geofences.controller.js';
import { sagasRouter } from './controllers/sagas.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { WsGateway } from './ws/ws-gateway.js';

export interface AppOptions {
  corsOrigin: string;
  /** Request logging; tests turn it off. */
  httpLog?: boolean;
}

export function buildApp(deps: Container, opts: AppOptions): Express {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: opts.corsOrigin }));
  if (opts.httpLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/shipments', shipmentsRouter({ shipments: deps.shipments, cancellation: deps.cancellation }));
  app.use('/api/locations', locationsRouter({ tracker: deps.tracker }));
  app.use('/api/geofences', geofencesRouter({ geofences: deps.geofences }));
  app.use('/api/sagas', sagasRouter({ cancellation: deps.cancellation }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: Express, gateway: WsGateway): Server {
  const httpServer = createServer(app);
  gateway.attach(httpServer);
  return httpServer;
}
