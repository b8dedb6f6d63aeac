import type {
  HistoryPoint,
  HistoryStatistics,
  LocationHistoryBucket,
} from '../entities/location-history.js';
import { distanceKm } from '../geo/geo-math.js';

export const DEFAULT_MAX_POINTS_PER_DAY = 1000;
export const ARCHIVE_POINTS_PER_DAY = 100;

/** UTC calendar day, YYYY-MM-DD. */
export function dateKey(ts: Date): string {
  return ts.toISOString().slice(0, 10);
}

export function emptyStatistics(): HistoryStatistics {
  return { totalPoints: 0, totalDistanceKm: 0, speedSamples: 0 };
}

export function createBucket(shipmentId: string, date: string, at: Date): LocationHistoryBucket {
  return {
    shipmentId,
    date,
    points: [],
    statistics: emptyStatistics(),
    createdAt: at,
    updatedAt: at,
    version: 0,
  };
}

/** Folds one point into the running statistics without looking at older points. */
export function accumulate(
  stats: HistoryStatistics,
  previous: HistoryPoint | undefined,
  point: HistoryPoint,
): HistoryStatistics {
  const leg = previous ? distanceKm(previous, point) : 0;
  const speedSamples = point.speed === undefined ? stats.speedSamples : stats.speedSamples + 1;
  const avgSpeed =
    point.speed === undefined
      ? stats.avgSpeed
      : ((stats.avgSpeed ?? 0) * stats.speedSamples + point.speed) / speedSamples;

  return {
    totalPoints: stats.totalPoints + 1,
    totalDistanceKm: stats.totalDistanceKm + leg,
    minLat: Math.min(stats.minLat ?? point.lat, point.lat),
    maxLat: Math.max(stats.maxLat ?? point.lat, point.lat),
    minLng: Math.min(stats.minLng ?? point.lng, point.lng),
    maxLng: Math.max(stats.maxLng ?? point.lng, point.lng),
    avgSpeed,
    maxSpeed:
      point.speed === undefined ? stats.maxSpeed : Math.max(stats.maxSpeed ?? point.speed, point.speed),
    speedSamples,
    lastUpdate: point.ts,
  };
}

/**
 * Uniform sub-sampling to exactly `target` points. The first and the most
 * recent point are always kept.
 */
export function compress(points: readonly HistoryPoint[], target: number): HistoryPoint[] {
  const n = points.length;
  if (target >= n) return [...points];
  const last = points[n - 1];
  if (!last || target <= 0) return [];
  if (target === 1) return [last];

  const step = (n - 1) / (target - 1);
  const kept: HistoryPoint[] = [];
  for (let i = 0; i < target; i++) {
    const p = points[Math.round(i * step)];
    if (p) kept.push(p);
  }
  return kept;
}

/**
 * Appends `point` and, once the bucket holds more than `maxPoints`,
 * compresses it to half of that.
 */
export function appendPoint(
  bucket: LocationHistoryBucket,
  point: HistoryPoint,
  at: Date,
  maxPoints: number = DEFAULT_MAX_POINTS_PER_DAY,
): LocationHistoryBucket {
  const previous = bucket.points[bucket.points.length - 1];
  const appended = [...bucket.points, point];
  const points =
    appended.length > maxPoints ? compress(appended, Math.floor(maxPoints / 2)) : appended;

  return {
    ...bucket,
    points,
    statistics: accumulate(bucket.statistics, previous, point),
    updatedAt: at,
  };
}

export function compactBucket(
  bucket: LocationHistoryBucket,
  target: number,
  at: Date,
): LocationHistoryBucket {
  if (bucket.points.length <= target) return bucket;
  return { ...bucket, points: compress(bucket.points, target), updatedAt: at };
}
