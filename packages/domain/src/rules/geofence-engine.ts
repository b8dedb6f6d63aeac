import type { Geofence, GeofenceShape } from '../entities/geofence.js';
import { MAX_GEOFENCE_RADIUS_METERS } from '../entities/geofence.js';
import type { GeofencePresence, GeofenceTransition } from '../entities/location.js';
import type { GeoPoint } from '../entities/shipment.js';
import { assertNever } from '../entities/domain-event.js';
import { InvalidArgumentError } from '../errors.js';
import { distanceKm, isValidCoordinate, polygonAreaKm2, polygonContains } from '../geo/geo-math.js';

export type CircularShape = Extract<GeofenceShape, { kind: 'circle' }>;
export type PolygonShape = Extract<GeofenceShape, { kind: 'polygon' }>;

/** Boundary inclusive: a point exactly `radiusMeters` away is inside. */
export function containsCircular(shape: CircularShape, point: GeoPoint): boolean {
  return distanceKm(shape.center, point) * 1000 <= shape.radiusMeters;
}

/** Points on an edge or vertex are inside. */
export function containsPolygon(shape: PolygonShape, point: GeoPoint): boolean {
  return polygonContains(shape.vertices, point);
}

export function contains(shape: GeofenceShape, point: GeoPoint): boolean {
  switch (shape.kind) {
    case 'circle':
      return containsCircular(shape, point);
    case 'polygon':
      return containsPolygon(shape, point);
    default:
      return assertNever(shape);
  }
}

export function shapeAreaKm2(shape: GeofenceShape): number {
  switch (shape.kind) {
    case 'circle': {
      const rKm = shape.radiusMeters / 1000;
      return Math.PI * rKm * rKm;
    }
    case 'polygon':
      return polygonAreaKm2(shape.vertices);
    default:
      return assertNever(shape);
  }
}

export function validateGeofence(
  fence: Pick<Geofence, 'name' | 'shape' | 'notification' | 'priority'>,
): void {
  if (!fence.name.trim()) throw new InvalidArgumentError('Geofence name is required');
  if (!Number.isInteger(fence.priority)) {
    throw new InvalidArgumentError('Geofence priority must be an integer');
  }
  if (
    !Number.isFinite(fence.notification.dwellThresholdMinutes) ||
    fence.notification.dwellThresholdMinutes <= 0
  ) {
    throw new InvalidArgumentError('Dwell threshold must be a positive number of minutes');
  }

  const shape = fence.shape;
  switch (shape.kind) {
    case 'circle':
      if (!isValidCoordinate(shape.center.lat, shape.center.lng)) {
        throw new InvalidArgumentError('Geofence center is out of range');
      }
      if (
        !Number.isFinite(shape.radiusMeters) ||
        shape.radiusMeters <= 0 ||
        shape.radiusMeters > MAX_GEOFENCE_RADIUS_METERS
      ) {
        throw new InvalidArgumentError(
          `Geofence radius must be in (0, ${MAX_GEOFENCE_RADIUS_METERS}] metres, got ${shape.radiusMeters}`,
        );
      }
      return;
    case 'polygon':
      if (shape.vertices.length < 3) {
        throw new InvalidArgumentError('Polygon geofence needs at least 3 vertices');
      }
      if (shape.vertices.some((v) => !isValidCoordinate(v.lat, v.lng))) {
        throw new InvalidArgumentError('Polygon geofence has a vertex out of range');
      }
      return;
    default:
      assertNever(shape);
  }
}

/**
 * Overlap arbitration: higher `priority`, then smaller area, then id.
 * Returns a new array; the input is left untouched.
 */
export function orderForEvaluation(fences: readonly Geofence[]): Geofence[] {
  return [...fences].sort((a, b) => {
    if (a.priority !== b.priority) return b.priority - a.priority;
    const areaDiff = shapeAreaKm2(a.shape) - shapeAreaKm2(b.shape);
    if (areaDiff !== 0) return areaDiff;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

// ─── Evaluation ──────────────────────────────────────────────────────────────

export interface GeofenceCrossing {
  readonly transition: GeofenceTransition;
  readonly geofenceId: string;
  readonly geofenceName: string;
  /** Time spent inside; 0 for ENTER. */
  readonly dwellMs: number;
  /** Whether the fence's notification policy asks for this transition. */
  readonly notify: boolean;
}

export interface GeofenceEvaluation {
  readonly presence?: GeofencePresence;
  readonly crossings: readonly GeofenceCrossing[];
}

/**
 * Compares the new position against the previously recorded presence.
 * Inactive fences never match. A shipment stays attached to the fence it is
 * in for as long as that fence still contains it.
 */
export function evaluate(
  fences: readonly Geofence[],
  prior: GeofencePresence | undefined,
  point: GeoPoint,
  timestamp: Date,
): GeofenceEvaluation {
  const matching = orderForEvaluation(fences.filter((f) => f.active && contains(f.shape, point)));
  const crossings: GeofenceCrossing[] = [];

  if (prior) {
    const current = matching.find((f) => f.id === prior.geofenceId);
    const dwellMs = Math.max(0, timestamp.getTime() - prior.enteredAt.getTime());

    if (current) {
      const policy = current.notification;
      if (
        !prior.dwellNotified &&
        policy.notifyOnDwell &&
        dwellMs >= policy.dwellThresholdMinutes * 60_000
      ) {
        crossings.push({
          transition: 'DWELL',
          geofenceId: current.id,
          geofenceName: current.name,
          dwellMs,
          notify: true,
        });
        return { presence: { ...prior, transition: 'DWELL', dwellNotified: true }, crossings };
      }
      return { presence: prior, crossings };
    }

    const left = fences.find((f) => f.id === prior.geofenceId);
    crossings.push({
      transition: 'EXIT',
      geofenceId: prior.geofenceId,
      geofenceName: left?.name ?? prior.geofenceId,
      dwellMs,
      notify: left?.notification.notifyOnExit ?? true,
    });
  }

  const entered = matching[0];
  if (!entered) return { presence: undefined, crossings };

  crossings.push({
    transition: 'ENTER',
    geofenceId: entered.id,
    geofenceName: entered.name,
    dwellMs: 0,
    notify: entered.notification.notifyOnEntry,
  });
  return {
    presence: {
      geofenceId: entered.id,
      transition: 'ENTER',
      enteredAt: timestamp,
      dwellNotified: false,
    },
    crossings,
  };
}
