import type { Address, GeoPoint } from '../../entities/shipment.js';
import type { LatestLocation, Location } from '../../entities/location.js';
import type { SaveResult } from './save-result.port.js';

export interface LocationRepositoryPort {
  /** Raw report log; append only. */
  insert(location: Location): Promise<void>;
  findById(id: string): Promise<Location | null>;
  updateAddress(id: string, address: Address): Promise<Location | null>;
  findHistory(shipmentId: string, from: Date, to: Date): Promise<Location[]>;
  deleteByShipment(shipmentId: string): Promise<number>;
  deleteOlderThan(cutoff: Date): Promise<number>;

  /** Current-position projection, one row per shipment. */
  getLatest(shipmentId: string): Promise<LatestLocation | null>;
  /** Same contract as the shipment repository: 0 inserts, mismatch → `version_conflict`. */
  saveLatest(location: Location, expectedVersion: number): Promise<SaveResult<LatestLocation>>;
  findLatestNear(point: GeoPoint, radiusKm: number, since?: Date): Promise<Location[]>;
  findMovingSince(since: Date): Promise<Location[]>;
}
