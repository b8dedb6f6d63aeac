import type {
  LocationHistoryBucket,
  LocationHistoryRepositoryPort,
  SaveResult,
} from '@cargotrace/domain';
import { conflict, saved } from '@cargotrace/domain';

const key = (shipmentId: string, date: string) => `${shipmentId}|${date}`;

export class MemoryLocationHistoryRepository implements LocationHistoryRepositoryPort {
  private readonly buckets = new Map<string, LocationHistoryBucket>();

  async findBucket(shipmentId: string, date: string): Promise<LocationHistoryBucket | null> {
    return this.buckets.get(key(shipmentId, date)) ?? null;
  }

  async saveBucket(
    bucket: LocationHistoryBucket,
    expectedVersion: number,
  ): Promise<SaveResult<LocationHistoryBucket>> {
    const k = key(bucket.shipmentId, bucket.date);
    if ((this.buckets.get(k)?.version ?? 0) !== expectedVersion) return conflict();
    const next: LocationHistoryBucket = { ...bucket, version: expectedVersion + 1 };
    this.buckets.set(k, next);
    return saved(next);
  }

  async findRange(
    shipmentId: string,
    fromDate: string,
    toDate: string,
  ): Promise<LocationHistoryBucket[]> {
    return [...this.buckets.values()]
      .filter((b) => b.shipmentId === shipmentId && b.date >= fromDate && b.date <= toDate)
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  async findOlderThan(date: string): Promise<LocationHistoryBucket[]> {
    return [...this.buckets.values()]
      .filter((b) => b.date < date)
      .sort((a, b) => a.date.localeCompare(b.date) || a.shipmentId.localeCompare(b.shipmentId));
  }

  async deleteByShipment(shipmentId: string): Promise<number> {
    let removed = 0;
    for (const [k, b] of this.buckets) {
      if (b.shipmentId === shipmentId) {
        this.buckets.delete(k);
        removed++;
      }
    }
    return removed;
  }
}
