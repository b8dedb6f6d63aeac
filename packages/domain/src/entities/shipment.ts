export type ShipmentStatus =
  | 'CREATED'
  | 'CONFIRMED'
  | 'DISPATCHED'
  | 'IN_TRANSIT'
  | 'EXCEPTION'
  | 'DELIVERED'
  | 'CANCELLED';

export const SHIPMENT_STATUSES: readonly ShipmentStatus[] = [
  'CREATED',
  'CONFIRMED',
  'DISPATCHED',
  'IN_TRANSIT',
  'EXCEPTION',
  'DELIVERED',
  'CANCELLED',
];

export type ShipmentMode =
  | 'TRUCK_FTL'
  | 'TRUCK_LTL'
  | 'RAIL'
  | 'OCEAN'
  | 'AIR'
  | 'PARCEL'
  | 'INTERMODAL'
  | 'DRAYAGE'
  | 'COURIER';

export type StopType =
  | 'PICKUP'
  | 'DELIVERY'
  | 'CROSS_DOCK'
  | 'WAYPOINT'
  | 'CUSTOMS'
  | 'INSPECTION'
  | 'FUEL'
  | 'REST';

export type StopStatus =
  | 'PENDING'
  | 'APPROACHING'
  | 'ARRIVED'
  | 'IN_PROGRESS'
  | 'COMPLETED'
  | 'SKIPPED'
  | 'FAILED';

export interface GeoPoint {
  readonly lat: number;
  readonly lng: number;
}

export interface Address {
  readonly line1: string;
  readonly line2?: string;
  readonly city: string;
  readonly state?: string;
  readonly postalCode?: string;
  readonly country: string;
  readonly lat?: number;
  readonly lng?: number;
}

export interface Stop {
  readonly id: string;
  readonly sequenceNumber: number;
  readonly type: StopType;
  readonly location: Address;
  readonly geofenceId?: string;
  readonly plannedArrival?: Date;
  readonly actualArrival?: Date;
  readonly plannedDeparture?: Date;
  readonly actualDeparture?: Date;
  readonly referenceNumber?: string;
  readonly contactName?: string;
  readonly notes?: string;
  readonly status: StopStatus;
}

/** Human-readable audit trail entry kept on the aggregate. */
export interface ShipmentEvent {
  readonly id: string;
  readonly type: string;
  readonly occurredAt: Date;
  readonly description: string;
  readonly actor: string;
}

export interface PendingCancellation {
  readonly sagaId: string;
  readonly requestedAt: Date;
  readonly reason: string;
}

export interface Shipment {
  readonly id: string;
  readonly shipmentNumber: string;
  readonly customerId: string;
  readonly carrierId: string;
  readonly status: ShipmentStatus;
  readonly mode: ShipmentMode;
  readonly origin: Address;
  readonly destination: Address;
  readonly plannedPickupTime: Date;
  readonly plannedDeliveryTime: Date;
  readonly actualPickupTime?: Date;
  readonly actualDeliveryTime?: Date;
  readonly estimatedDeliveryTime?: Date;
  readonly stops: readonly Stop[];
  readonly events: readonly ShipmentEvent[];
  readonly pendingCancellation?: PendingCancellation;
  readonly tags: readonly string[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
  /** Optimistic concurrency token; 0 until first persisted. */
  readonly version: number;
}

export function isTerminalStatus(status: ShipmentStatus): boolean {
  return status === 'DELIVERED' || status === 'CANCELLED';
}

export function isTerminalStopStatus(status: StopStatus): boolean {
  return status === 'COMPLETED' || status === 'SKIPPED' || status === 'FAILED';
}

export function addressPoint(address: Address): GeoPoint | null {
  if (address.lat === undefined || address.lng === undefined) return null;
  return { lat: address.lat, lng: address.lng };
}
