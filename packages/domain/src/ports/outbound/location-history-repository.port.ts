import type { LocationHistoryBucket } from '../../entities/location-history.js';
import type { SaveResult } from './save-result.port.js';

export interface LocationHistoryRepositoryPort {
  findBucket(shipmentId: string, date: string): Promise<LocationHistoryBucket | null>;
  saveBucket(
    bucket: LocationHistoryBucket,
    expectedVersion: number,
  ): Promise<SaveResult<LocationHistoryBucket>>;
  /** Inclusive on both ends, ordered by date. */
  findRange(shipmentId: string, fromDate: string, toDate: string): Promise<LocationHistoryBucket[]>;
  findOlderThan(date: string): Promise<LocationHistoryBucket[]>;
  deleteByShipment(shipmentId: string): Promise<number>;
}
