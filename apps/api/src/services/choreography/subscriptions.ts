import type {
  DomainEventOf,
  EtaEstimatorPort,
  EventStreamPort,
  GeofenceRepositoryPort,
  NotificationPort,
  Shipment,
  ShipmentRepositoryPort,
  ShipmentStatus,
  StopStatus,
  TrackingSessionPort,
} from '@cargotrace/domain';
import { addressPoint, nextOpenStop, stopAtGeofence } from '@cargotrace/domain';
import type { ShipmentService } from '../shipments/shipment.service.js';
import type { Subscriber, SubscriptionTable, UniversalSubscriber } from './event-choreographer.js';

export const CHOREOGRAPHY_ACTOR = 'choreographer';

/** An ETA that moves by less than this is not written back. */
export const ETA_TOLERANCE_MS = 5 * 60_000;

const IN_MOTION: ReadonlySet<ShipmentStatus> = new Set(['DISPATCHED', 'IN_TRANSIT', 'EXCEPTION']);
const ARRIVABLE: ReadonlySet<StopStatus> = new Set(['PENDING', 'APPROACHING']);
const DEPARTABLE: ReadonlySet<StopStatus> = new Set(['ARRIVED', 'IN_PROGRESS']);

export interface SubscriberDeps {
  /** Reads; a missing shipment makes shipment-side subscribers no-ops. */
  shipmentReader: ShipmentRepositoryPort;
  shipments: Pick<ShipmentService, 'updateStopStatus' | 'updateEstimatedDelivery'>;
  geofences: GeofenceRepositoryPort;
  sessions: TrackingSessionPort;
  stream: EventStreamPort;
  notifications: NotificationPort;
  eta: EtaEstimatorPort;
  stopApproachRadiusKm: number;
}

type GeofenceEvent = DomainEventOf<'GeofenceEntered'> | DomainEventOf<'GeofenceExited'>;

export function buildSubscriptionTable(deps: SubscriberDeps): SubscriptionTable {
  const load = async (id: string): Promise<Shipment | null> => deps.shipmentReader.findById(id);

  const stopFor = async (event: GeofenceEvent) => {
    const shipment = await load(event.aggregateId);
    if (!shipment) return undefined;
    const fence = await deps.geofences.findById(event.payload.geofenceId);
    const stop = stopAtGeofence(shipment, event.payload.geofenceId, fence);
    return stop ? { shipment, stop } : undefined;
  };

  // ─── event stream ───────────────────────────────────────────────────────────

  const record: UniversalSubscriber = {
    name: 'event-stream.record',
    context: 'event-stream',
    handle: (event) => deps.stream.record(event),
  };

  const initialiseStream: Subscriber<'ShipmentCreated'> = {
    name: 'event-stream.initialise',
    context: 'event-stream',
    handle: async (event) => {
      await deps.stream.initialize(event.aggregateId, event.occurredAt);
      await deps.stream.record(event);
    },
  };

  const arrivalMilestone: Subscriber<'GeofenceEntered'> = {
    name: 'event-stream.arrival-milestone',
    context: 'event-stream',
    handle: async (event) => {
      const hit = await stopFor(event);
      if (!hit) return;
      await deps.stream.createMilestone({
        eventId: event.eventId,
        shipmentId: event.aggregateId,
        description: `Arrived at stop ${hit.stop.sequenceNumber} (${event.payload.geofenceName})`,
        occurredAt: event.occurredAt,
      });
    },
  };

  // ─── location ───────────────────────────────────────────────────────────────

  const startTracking: Subscriber<'ShipmentCreated'> = {
    name: 'location.start-tracking-session',
    context: 'location',
    handle: (event) => deps.sessions.start(event.aggregateId, event.occurredAt),
  };

  // ─── notification ───────────────────────────────────────────────────────────

  const confirmation: Subscriber<'ShipmentCreated'> = {
    name: 'notification.confirmation',
    context: 'notification',
    handle: async (event) => {
      const shipment = await load(event.aggregateId);
      if (shipment) await deps.notifications.sendConfirmation(shipment);
    },
  };

  const arrivalAlert: Subscriber<'GeofenceEntered'> = {
    name: 'notification.arrival-alert',
    context: 'notification',
    handle: async (event) => {
      if (!event.payload.notify) return;
      const hit = await stopFor(event);
      if (hit) await deps.notifications.sendArrivalAlert(hit.shipment, hit.stop, event.eventId);
    },
  };

  // ─── shipment ───────────────────────────────────────────────────────────────

  const markArrived: Subscriber<'GeofenceEntered'> = {
    name: 'shipment.mark-stop-arrived',
    context: 'shipment',
    handle: async (event) => {
      const hit = await stopFor(event);
      if (!hit || !ARRIVABLE.has(hit.stop.status)) return;
      await deps.shipments.updateStopStatus(
        hit.shipment.id,
        hit.stop.id,
        'ARRIVED',
        CHOREOGRAPHY_ACTOR,
        event.payload.geofenceId,
      );
    },
  };

  const markCompleted: Subscriber<'GeofenceExited'> = {
    name: 'shipment.mark-stop-completed',
    context: 'shipment',
    handle: async (event) => {
      const hit = await stopFor(event);
      if (!hit || !DEPARTABLE.has(hit.stop.status)) return;
      await deps.shipments.updateStopStatus(hit.shipment.id, hit.stop.id, 'COMPLETED', CHOREOGRAPHY_ACTOR);
    },
  };

  const trackProgress: Subscriber<'LocationUpdated'> = {
    name: 'shipment.track-progress',
    context: 'shipment',
    handle: async (event) => {
      let shipment = await load(event.aggregateId);
      if (!shipment || !IN_MOTION.has(shipment.status) || shipment.pendingCancellation) return;
      const p = event.payload;

      if (p.nearestStopId && p.nearestStopKm !== undefined && p.nearestStopKm <= deps.stopApproachRadiusKm) {
        const stop = shipment.stops.find((s) => s.id === p.nearestStopId);
        if (stop?.status === 'PENDING') {
          shipment = await deps.shipments.updateStopStatus(
            shipment.id,
            stop.id,
            'APPROACHING',
            CHOREOGRAPHY_ACTOR,
          );
        }
      }

      const target = nextOpenStop(shipment);
      const to = target ? addressPoint(target.location) : addressPoint(shipment.destination);
      if (!to || p.speed === undefined) return;

      const eta = deps.eta.estimate({
        from: { lat: p.latitude, lng: p.longitude },
        to,
        speed: p.speed,
        at: p.timestamp,
      });
      if (!eta) return;
      const current = shipment.estimatedDeliveryTime;
      if (current && Math.abs(eta.getTime() - current.getTime()) < ETA_TOLERANCE_MS) return;

      await deps.shipments.updateEstimatedDelivery(shipment.id, eta, CHOREOGRAPHY_ACTOR);
    },
  };

  return {
    ShipmentCreated: [startTracking, initialiseStream, confirmation],
    ShipmentDispatched: [record],
    ShipmentStatusChanged: [record],
    ShipmentCancelled: [record],
    ShipmentDelivered: [record],
    ShipmentEtaUpdated: [record],
    StopAdded: [record],
    StopRemoved: [record],
    StopStatusChanged: [record],
    StopArrived: [record],
    LocationUpdated: [trackProgress, record],
    GeofenceEntered: [markArrived, arrivalMilestone, arrivalAlert, record],
    GeofenceExited: [markCompleted, record],
    GeofenceDwelled: [record],
    RouteDeviationDetected: [record],
  };
}
