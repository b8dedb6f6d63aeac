import type { Address } from './shipment.js';

export type LocationQuality = 'HIGH' | 'STANDARD' | 'LOW' | 'UNKNOWN';

export type GeofenceTransition = 'ENTER' | 'EXIT' | 'DWELL';

/** Which fence a shipment is currently inside, carried on its latest location. */
export interface GeofencePresence {
  readonly geofenceId: string;
  readonly transition: GeofenceTransition;
  readonly enteredAt: Date;
  readonly dwellNotified: boolean;
}

export interface NearestStop {
  readonly stopId: string;
  readonly distanceKm: number;
}

export interface Location {
  readonly id: string;
  readonly shipmentId: string;
  readonly deviceId: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude?: number;
  /** metres per second */
  readonly speed?: number;
  readonly heading?: number;
  /** horizontal accuracy in metres */
  readonly accuracy?: number;
  readonly timestamp: Date;
  readonly receivedAt: Date;
  readonly quality: LocationQuality;
  readonly isMoving: boolean;
  readonly geofence?: GeofencePresence;
  readonly nearestStop?: NearestStop;
  readonly address?: Address;
  readonly metadata: Record<string, unknown>;
}

/** The per-shipment "current position" projection with its concurrency token. */
export interface LatestLocation {
  readonly location: Location;
  readonly version: number;
}

export interface LocationReport {
  shipmentId: string;
  deviceId: string;
  latitude: number;
  longitude: number;
  timestamp: Date;
  altitude?: number;
  speed?: number;
  heading?: number;
  accuracy?: number;
  metadata?: Record<string, unknown>;
}
