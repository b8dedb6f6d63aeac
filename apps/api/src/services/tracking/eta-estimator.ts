import type { EtaEstimatorPort, EtaQuery } from '@cargotrace/domain';
import { distanceKm } from '@cargotrace/domain';

/** Below this speed (m/s) the vehicle counts as stationary and no estimate is made. */
export const MIN_MOVING_SPEED_MS = 0.5;

/** Remaining great-circle distance over current speed. No routing. */
export class StraightLineEtaEstimator implements EtaEstimatorPort {
  estimate({ from, to, speed, at }: EtaQuery): Date | null {
    if (!Number.isFinite(speed) || speed <= MIN_MOVING_SPEED_MS) return null;
    const seconds = (distanceKm(from, to) * 1000) / speed;
    return new Date(at.getTime() + Math.round(seconds * 1000));
  }
}
