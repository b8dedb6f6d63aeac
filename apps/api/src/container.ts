import {
  MemoryEventStream,
  MemoryGeofenceRepository,
  MemoryLocationHistoryRepository,
  MemoryLocationRepository,
  MemoryNotifications,
  MemoryRefunds,
  MemorySagaRepository,
  MemoryShipmentRepository,
  MemoryTrackingSessions,
  NominatimGeocoder,
  PgEventStreamAdapter,
  PgGeofenceRepository,
  PgLocationHistoryRepository,
  PgLocationRepository,
  PgNotificationOutbox,
  PgRefundLedger,
  PgSagaRepository,
  PgShipmentRepository,
  PgTrackingSessionAdapter,
  getPool,
} from '@cargotrace/adapters';
import type { Clock } from '@cargotrace/adapters';
import type {
  EventStreamPort,
  EventTransportPort,
  GeofenceRepositoryPort,
  LocationHistoryRepositoryPort,
  LocationRepositoryPort,
  NotificationPort,
  RefundPort,
  SagaRepositoryPort,
  ShipmentRepositoryPort,
  TrackingSessionPort,
} from '@cargotrace/domain';
import type { AppConfig } from './config/app.config.js';
import { EventChoreographer } from './services/choreography/event-choreographer.js';
import { buildSubscriptionTable } from './services/choreography/subscriptions.js';
import { GeofenceService } from './services/geofences/geofence.service.js';
import { CancellationSaga } from './services/saga/cancellation-saga.js';
import { ShipmentService } from './services/shipments/shipment.service.js';
import { StraightLineEtaEstimator } from './services/tracking/eta-estimator.js';
import { LocationTracker } from './services/tracking/location-tracker.js';
import { WsGateway } from './ws/ws-gateway.js';

// ─── Infrastructure ──────────────────────────────────────────────────────────

export interface Infrastructure {
  shipments: ShipmentRepositoryPort;
  locations: LocationRepositoryPort;
  history: LocationHistoryRepositoryPort;
  geofences: GeofenceRepositoryPort;
  sagas: SagaRepositoryPort;
  sessions: TrackingSessionPort;
  stream: EventStreamPort;
  notifications: NotificationPort;
  refunds: RefundPort;
}

export interface MemoryInfrastructure extends Infrastructure {
  shipments: MemoryShipmentRepository;
  locations: MemoryLocationRepository;
  history: MemoryLocationHistoryRepository;
  geofences: MemoryGeofenceRepository;
  sagas: MemorySagaRepository;
  sessions: MemoryTrackingSessions;
  stream: MemoryEventStream;
  notifications: MemoryNotifications;
  refunds: MemoryRefunds;
}

export function memoryInfrastructure(): MemoryInfrastructure {
  return {
    shipments: new MemoryShipmentRepository(),
    locations: new MemoryLocationRepository(),
    history: new MemoryLocationHistoryRepository(),
    geofences: new MemoryGeofenceRepository(),
    sagas: new MemorySagaRepository(),
    sessions: new MemoryTrackingSessions(),
    stream: new MemoryEventStream(),
    notifications: new MemoryNotifications(),
    refunds: new MemoryRefunds(),
  };
}

export function pgInfrastructure(config: Pick<AppConfig, 'databaseUrl'>): Infrastructure {
  const pool = getPool(config.databaseUrl);
  return {
    shipments: new PgShipmentRepository(pool),
    locations: new PgLocationRepository(pool),
    history: new PgLocationHistoryRepository(pool),
    geofences: new PgGeofenceRepository(pool),
    sagas: new PgSagaRepository(pool),
    sessions: new PgTrackingSessionAdapter(pool),
    stream: new PgEventStreamAdapter(pool),
    notifications: new PgNotificationOutbox(pool),
    refunds: new PgRefundLedger(pool),
  };
}

// ─── Container ───────────────────────────────────────────────────────────────

export interface Container {
  choreographer: EventChoreographer;
  shipments: ShipmentService;
  tracker: LocationTracker;
  geofences: GeofenceService;
  cancellation: CancellationSaga;
}

export interface ContainerOptions {
  /** Defaults to a WebSocket gateway that is attached later by the server. */
  transport?: EventTransportPort;
  clock?: Clock;
  newId?: () => string;
}

export function createContainer(
  config: Pick<AppConfig, 'tracking' | 'sagaStepTimeoutMs' | 'geocoderBaseUrl'>,
  infra: Infrastructure,
  opts: ContainerOptions = {},
): Container {
  const { clock, newId } = opts;
  const choreographer = new EventChoreographer(opts.transport ?? new WsGateway());

  const shipments = new ShipmentService({
    shipments: infra.shipments,
    events: choreographer,
    clock,
    newId,
  });

  const tracker = new LocationTracker({
    locations: infra.locations,
    history: infra.history,
    geofences: infra.geofences,
    shipments: infra.shipments,
    events: choreographer,
    geocoder: config.geocoderBaseUrl
      ? new NominatimGeocoder({ baseUrl: config.geocoderBaseUrl })
      : undefined,
    clock,
    newId,
    maxPointsPerDay: config.tracking.maxPointsPerDay,
    routeDeviationThresholdKm: config.tracking.routeDeviationThresholdKm,
  });

  const geofences = new GeofenceService(infra.geofences, { clock, newId });

  const cancellation = new CancellationSaga({
    shipments,
    sagas: infra.sagas,
    sessions: infra.sessions,
    notifications: infra.notifications,
    refunds: infra.refunds,
    clock,
    newId,
    stepTimeoutMs: config.sagaStepTimeoutMs,
  });

  choreographer.wire(
    buildSubscriptionTable({
      shipmentReader: infra.shipments,
      shipments,
      geofences: infra.geofences,
      sessions: infra.sessions,
      stream: infra.stream,
      notifications: infra.notifications,
      eta: new StraightLineEtaEstimator(),
      stopApproachRadiusKm: config.tracking.stopApproachRadiusKm,
    }),
  );

  return { choreographer, shipments, tracker, geofences, cancellation };
}
