import type { GeoPoint } from '../entities/shipment.js';

export const EARTH_RADIUS_KM = 6371;

const toRad = (deg: number): number => (deg * Math.PI) / 180;
const toDeg = (rad: number): number => (rad * 180) / Math.PI;

/** Great-circle distance in kilometres (Haversine). */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_KM * c;
}

/** Initial bearing from `a` to `b`, degrees in [0, 360). */
export function bearingDeg(a: GeoPoint, b: GeoPoint): number {
  const φ1 = toRad(a.lat);
  const φ2 = toRad(b.lat);
  const Δλ = toRad(b.lng - a.lng);
  const y = Math.sin(Δλ) * Math.cos(φ2);
  const x = Math.cos(φ1) * Math.sin(φ2) - Math.sin(φ1) * Math.cos(φ2) * Math.cos(Δλ);
  return (toDeg(Math.atan2(y, x)) + 360) % 360;
}

/**
 * Distance from `p` to the great-circle segment `a`→`b`.
 * Falls back to the nearer endpoint when the projection lands outside the segment.
 */
export function distanceToSegmentKm(p: GeoPoint, a: GeoPoint, b: GeoPoint): number {
  const dAP = distanceKm(a, p);
  const dAB = distanceKm(a, b);
  if (dAB === 0) return dAP;

  const δ13 = dAP / EARTH_RADIUS_KM;
  const θ13 = toRad(bearingDeg(a, p));
  const θ12 = toRad(bearingDeg(a, b));
  const crossTrack = Math.asin(Math.sin(δ13) * Math.sin(θ13 - θ12));
  const alongTrack = Math.acos(
    Math.max(-1, Math.min(1, Math.cos(δ13) / Math.cos(crossTrack))),
  );
  const alongKm = alongTrack * EARTH_RADIUS_KM;

  // Behind `a` (angle between bearings > 90°) or past `b`.
  if (Math.cos(θ13 - θ12) < 0 || alongKm > dAB) {
    return Math.min(dAP, distanceKm(b, p));
  }
  return Math.abs(crossTrack) * EARTH_RADIUS_KM;
}

/**
 * Ray-casting point-in-polygon over lat/lng treated as planar coordinates.
 * Points on an edge or vertex count as inside.
 */
export function polygonContains(vertices: readonly GeoPoint[], p: GeoPoint): boolean {
  const n = vertices.length;
  if (n < 3) return false;

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const vi = vertices[i];
    const vj = vertices[j];
    if (!vi || !vj) continue;
    if (onSegment(vj, vi, p)) return true;

    const crosses = vi.lat > p.lat !== vj.lat > p.lat;
    if (crosses) {
      const lngAtLat = ((vj.lng - vi.lng) * (p.lat - vi.lat)) / (vj.lat - vi.lat) + vi.lng;
      if (p.lng < lngAtLat) inside = !inside;
    }
  }
  return inside;
}

const EPSILON = 1e-12;

function onSegment(a: GeoPoint, b: GeoPoint, p: GeoPoint): boolean {
  const cross = (b.lng - a.lng) * (p.lat - a.lat) - (b.lat - a.lat) * (p.lng - a.lng);
  if (Math.abs(cross) > EPSILON) return false;
  return (
    p.lat >= Math.min(a.lat, b.lat) - EPSILON &&
    p.lat <= Math.max(a.lat, b.lat) + EPSILON &&
    p.lng >= Math.min(a.lng, b.lng) - EPSILON &&
    p.lng <= Math.max(a.lng, b.lng) + EPSILON
  );
}

/** Approximate polygon area in km² (equirectangular projection around the first vertex). */
export function polygonAreaKm2(vertices: readonly GeoPoint[]): number {
  const origin = vertices[0];
  if (!origin || vertices.length < 3) return 0;
  const kx = (Math.PI / 180) * EARTH_RADIUS_KM * Math.cos(toRad(origin.lat));
  const ky = (Math.PI / 180) * EARTH_RADIUS_KM;
  let sum = 0;
  for (let i = 0; i < vertices.length; i++) {
    const a = vertices[i];
    const b = vertices[(i + 1) % vertices.length];
    if (!a || !b) continue;
    const ax = (a.lng - origin.lng) * kx;
    const ay = (a.lat - origin.lat) * ky;
    const bx = (b.lng - origin.lng) * kx;
    const by = (b.lat - origin.lat) * ky;
    sum += ax * by - bx * ay;
  }
  return Math.abs(sum) / 2;
}

export function isValidCoordinate(lat: number, lng: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    lat >= -90 &&
    lat <= 90 &&
    lng >= -180 &&
    lng <= 180
  );
}
