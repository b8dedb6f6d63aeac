import type {
  Geofence,
  GeofenceListFilters,
  GeofenceRepositoryPort,
  SaveResult,
} from '@cargotrace/domain';
import { conflict, saved } from '@cargotrace/domain';

export class MemoryGeofenceRepository implements GeofenceRepositoryPort {
  private readonly rows = new Map<string, Geofence>();

  async save(fence: Geofence, expectedVersion: number): Promise<SaveResult<Geofence>> {
    const nameTaken = [...this.rows.values()].some(
      (f) => f.id !== fence.id && f.ownerId === fence.ownerId && f.name === fence.name,
    );
    if (nameTaken) return conflict('duplicate');

    const current = this.rows.get(fence.id);
    if (expectedVersion === 0 && current) return conflict('duplicate');
    if ((current?.version ?? 0) !== expectedVersion) return conflict();

    const next: Geofence = { ...fence, version: expectedVersion + 1 };
    this.rows.set(next.id, next);
    return saved(next);
  }

  async findById(id: string): Promise<Geofence | null> {
    return this.rows.get(id) ?? null;
  }

  async findByOwnerAndName(ownerId: string, name: string): Promise<Geofence | null> {
    return [...this.rows.values()].find((f) => f.ownerId === ownerId && f.name === name) ?? null;
  }

  async findAllActive(): Promise<Geofence[]> {
    return this.list({ active: true });
  }

  async list(filters: GeofenceListFilters = {}): Promise<Geofence[]> {
    return [...this.rows.values()]
      .filter((f) => !filters.ownerId || f.ownerId === filters.ownerId)
      .filter((f) => filters.active === undefined || f.active === filters.active)
      .sort((a, b) => b.priority - a.priority || a.id.localeCompare(b.id));
  }
}
