import type { GeoPoint, Shipment, Stop } from '../entities/shipment.js';
import { addressPoint, isTerminalStopStatus } from '../entities/shipment.js';
import type { Geofence } from '../entities/geofence.js';
import type { NearestStop } from '../entities/location.js';
import { distanceKm, distanceToSegmentKm } from '../geo/geo-math.js';
import { contains } from './geofence-engine.js';

const openStops = (shipment: Shipment): Stop[] =>
  shipment.stops
    .filter((s) => !isTerminalStopStatus(s.status))
    .sort((a, b) => a.sequenceNumber - b.sequenceNumber);

/** Closest stop not yet completed, skipped or failed. Stops without coordinates are ignored. */
export function nearestOpenStop(shipment: Shipment, point: GeoPoint): NearestStop | undefined {
  let best: NearestStop | undefined;
  for (const stop of openStops(shipment)) {
    const at = addressPoint(stop.location);
    if (!at) continue;
    const d = distanceKm(at, point);
    if (!best || d < best.distanceKm) best = { stopId: stop.id, distanceKm: d };
  }
  return best;
}

/** Next open stop in sequence order that has coordinates. */
export function nextOpenStop(shipment: Shipment): Stop | undefined {
  return openStops(shipment).find((s) => addressPoint(s.location) !== null);
}

/** Origin, stops by sequence, destination; entries without coordinates drop out. */
export function plannedPath(shipment: Shipment): GeoPoint[] {
  const ordered = [...shipment.stops].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
  return [shipment.origin, ...ordered.map((s) => s.location), shipment.destination]
    .map(addressPoint)
    .filter((p): p is GeoPoint => p !== null);
}

/**
 * Distance from `point` to the nearest leg of the planned path.
 * `undefined` when the path has fewer than two located points.
 */
export function routeDeviationKm(shipment: Shipment, point: GeoPoint): number | undefined {
  const path = plannedPath(shipment);
  if (path.length < 2) return undefined;

  let min = Number.POSITIVE_INFINITY;
  for (let i = 1; i < path.length; i++) {
    const a = path[i - 1];
    const b = path[i];
    if (!a || !b) continue;
    min = Math.min(min, distanceToSegmentKm(point, a, b));
  }
  return min;
}

/**
 * The stop a geofence event refers to: the first open stop, by sequence,
 * that either names the fence or lies inside it.
 */
export function stopAtGeofence(
  shipment: Shipment,
  geofenceId: string,
  fence: Geofence | null,
): Stop | undefined {
  return openStops(shipment).find((stop) => {
    if (stop.geofenceId === geofenceId) return true;
    const at = addressPoint(stop.location);
    return fence !== null && at !== null && contains(fence.shape, at);
  });
}
