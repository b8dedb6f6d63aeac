import type {
  Address,
  GeoPoint,
  LatestLocation,
  Location,
  LocationRepositoryPort,
  SaveResult,
} from '@cargotrace/domain';
import { conflict, distanceKm, saved } from '@cargotrace/domain';

export class MemoryLocationRepository implements LocationRepositoryPort {
  private readonly reports = new Map<string, Location>();
  private readonly latest = new Map<string, LatestLocation>();

  async insert(location: Location): Promise<void> {
    if (!this.reports.has(location.id)) this.reports.set(location.id, location);
  }

  async findById(id: string): Promise<Location | null> {
    return this.reports.get(id) ?? null;
  }

  async updateAddress(id: string, address: Address): Promise<Location | null> {
    const current = this.reports.get(id);
    if (!current) return null;
    const updated: Location = { ...current, address };
    this.reports.set(id, updated);

    const projection = this.latest.get(current.shipmentId);
    if (projection?.location.id === id) {
      this.latest.set(current.shipmentId, { ...projection, location: updated });
    }
    return updated;
  }

  async findHistory(shipmentId: string, from: Date, to: Date): Promise<Location[]> {
    return [...this.reports.values()]
      .filter(
        (l) =>
          l.shipmentId === shipmentId &&
          l.timestamp.getTime() >= from.getTime() &&
          l.timestamp.getTime() <= to.getTime(),
      )
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.id.localeCompare(b.id));
  }

  async deleteByShipment(shipmentId: string): Promise<number> {
    this.latest.delete(shipmentId);
    let removed = 0;
    for (const [id, l] of this.reports) {
      if (l.shipmentId === shipmentId) {
        this.reports.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, l] of this.reports) {
      if (l.timestamp.getTime() < cutoff.getTime()) {
        this.reports.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async getLatest(shipmentId: string): Promise<LatestLocation | null> {
    return this.latest.get(shipmentId) ?? null;
  }

  async saveLatest(location: Location, expectedVersion: number): Promise<SaveResult<LatestLocation>> {
    const current = this.latest.get(location.shipmentId);
    if ((current?.version ?? 0) !== expectedVersion) return conflict();
    const next: LatestLocation = { location, version: expectedVersion + 1 };
    this.latest.set(location.shipmentId, next);
    return saved(next);
  }

  async findLatestNear(point: GeoPoint, radiusKm: number, since?: Date): Promise<Location[]> {
    return [...this.latest.values()]
      .map(({ location }) => ({
        location,
        d: distanceKm(point, { lat: location.latitude, lng: location.longitude }),
      }))
      .filter(({ location, d }) => d <= radiusKm && (!since || location.timestamp >= since))
      .sort((a, b) => a.d - b.d || a.location.shipmentId.localeCompare(b.location.shipmentId))
      .map(({ location }) => location);
  }

  async findMovingSince(since: Date): Promise<Location[]> {
    return [...this.latest.values()]
      .map(({ location }) => location)
      .filter((l) => l.isMoving && l.timestamp.getTime() >= since.getTime())
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}
