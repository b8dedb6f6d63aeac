import type { GeoPoint } from '../../entities/shipment.js';

export interface EtaQuery {
  from: GeoPoint;
  to: GeoPoint;
  /** metres per second */
  speed: number;
  at: Date;
}

export interface EtaEstimatorPort {
  /** `null` when no estimate can be made, e.g. the vehicle is stationary. */
  estimate(query: EtaQuery): Date | null;
}
