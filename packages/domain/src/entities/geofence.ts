import type { GeoPoint } from './shipment.js';

export type GeofenceShape =
  | { readonly kind: 'circle'; readonly center: GeoPoint; readonly radiusMeters: number }
  | { readonly kind: 'polygon'; readonly vertices: readonly GeoPoint[] };

export type GeofenceKind = GeofenceShape['kind'];

export interface GeofenceNotificationPolicy {
  readonly notifyOnEntry: boolean;
  readonly notifyOnExit: boolean;
  readonly notifyOnDwell: boolean;
  readonly dwellThresholdMinutes: number;
}

export interface Geofence {
  readonly id: string;
  readonly name: string;
  readonly ownerId: string;
  readonly shape: GeofenceShape;
  readonly active: boolean;
  readonly tags: readonly string[];
  readonly notification: GeofenceNotificationPolicy;
  /** Higher wins when fences overlap. */
  readonly priority: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly version: number;
}

export const DEFAULT_NOTIFICATION_POLICY: GeofenceNotificationPolicy = {
  notifyOnEntry: true,
  notifyOnExit: true,
  notifyOnDwell: false,
  dwellThresholdMinutes: 30,
};

export const MAX_GEOFENCE_RADIUS_METERS = 50_000;
