import type {
  Address,
  ShipmentMode,
  ShipmentStatus,
  StopStatus,
  StopType,
} from './shipment.js';

// ─── Payloads ─────────────────────────────────────────────────────────────────

export interface DomainEventPayloads {
  ShipmentCreated: {
    shipmentNumber: string;
    customerId: string;
    carrierId: string;
    mode: ShipmentMode;
    origin: Address;
    destination: Address;
    plannedPickupTime: Date;
    plannedDeliveryTime: Date;
  };
  ShipmentDispatched: {
    from: ShipmentStatus;
    dispatchedAt: Date;
    stopCount: number;
    actor: string;
  };
  ShipmentStatusChanged: {
    from: ShipmentStatus;
    to: ShipmentStatus;
    reason?: string;
    actor: string;
  };
  ShipmentCancelled: {
    from: ShipmentStatus;
    reason: string;
    actor: string;
  };
  ShipmentDelivered: {
    from: ShipmentStatus;
    deliveredAt: Date;
    actor: string;
  };
  ShipmentEtaUpdated: {
    previousEta?: Date;
    estimatedDeliveryTime: Date;
  };
  StopAdded: {
    stopId: string;
    sequenceNumber: number;
    type: StopType;
  };
  StopRemoved: {
    stopId: string;
    sequenceNumber: number;
  };
  StopStatusChanged: {
    stopId: string;
    sequenceNumber: number;
    from: StopStatus;
    to: StopStatus;
  };
  StopArrived: {
    stopId: string;
    sequenceNumber: number;
    arrivedAt: Date;
    geofenceId?: string;
  };
  LocationUpdated: {
    locationId: string;
    deviceId: string;
    latitude: number;
    longitude: number;
    speed?: number;
    heading?: number;
    isMoving: boolean;
    timestamp: Date;
    nearestStopId?: string;
    nearestStopKm?: number;
  };
  GeofenceEntered: {
    geofenceId: string;
    geofenceName: string;
    latitude: number;
    longitude: number;
    notify: boolean;
  };
  GeofenceExited: {
    geofenceId: string;
    geofenceName: string;
    latitude: number;
    longitude: number;
    dwellMs: number;
    notify: boolean;
  };
  GeofenceDwelled: {
    geofenceId: string;
    geofenceName: string;
    dwellMs: number;
    notify: boolean;
  };
  RouteDeviationDetected: {
    latitude: number;
    longitude: number;
    deviationKm: number;
    thresholdKm: number;
  };
}

export type DomainEventKind = keyof DomainEventPayloads;

export const DOMAIN_EVENT_KINDS: readonly DomainEventKind[] = [
  'ShipmentCreated',
  'ShipmentDispatched',
  'ShipmentStatusChanged',
  'ShipmentCancelled',
  'ShipmentDelivered',
  'ShipmentEtaUpdated',
  'StopAdded',
  'StopRemoved',
  'StopStatusChanged',
  'StopArrived',
  'LocationUpdated',
  'GeofenceEntered',
  'GeofenceExited',
  'GeofenceDwelled',
  'RouteDeviationDetected',
];

// ─── Envelope ─────────────────────────────────────────────────────────────────

export interface DomainEventOf<K extends DomainEventKind> {
  readonly eventId: string;
  readonly kind: K;
  readonly occurredAt: Date;
  /** Shipment id for every kind; location and geofence events are keyed by shipment too. */
  readonly aggregateId: string;
  readonly aggregateVersion: number;
  readonly payload: Readonly<DomainEventPayloads[K]>;
}

/** Discriminated on `kind`; `switch (event.kind)` narrows `payload`. */
export type DomainEvent = { [K in DomainEventKind]: DomainEventOf<K> }[DomainEventKind];

export type EventTopic =
  | 'shipment.created'
  | 'shipment.updated'
  | 'shipment.status-changed'
  | 'shipment.cancelled'
  | 'shipment.delivered'
  | 'location.updates'
  | 'location.geofence.events';

export function topicFor(kind: DomainEventKind): EventTopic {
  switch (kind) {
    case 'ShipmentCreated':
      return 'shipment.created';
    case 'ShipmentDispatched':
    case 'ShipmentStatusChanged':
      return 'shipment.status-changed';
    case 'ShipmentCancelled':
      return 'shipment.cancelled';
    case 'ShipmentDelivered':
      return 'shipment.delivered';
    case 'ShipmentEtaUpdated':
    case 'StopAdded':
    case 'StopRemoved':
    case 'StopStatusChanged':
    case 'StopArrived':
      return 'shipment.updated';
    case 'LocationUpdated':
    case 'RouteDeviationDetected':
      return 'location.updates';
    case 'GeofenceEntered':
    case 'GeofenceExited':
    case 'GeofenceDwelled':
      return 'location.geofence.events';
    default:
      return assertNever(kind);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
