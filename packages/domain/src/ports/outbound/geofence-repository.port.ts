import type { Geofence } from '../../entities/geofence.js';
import type { SaveResult } from './save-result.port.js';

export interface GeofenceListFilters {
  ownerId?: string;
  active?: boolean;
}

export interface GeofenceRepositoryPort {
  /** `duplicate` when another fence of the same owner already has the name. */
  save(fence: Geofence, expectedVersion: number): Promise<SaveResult<Geofence>>;
  findById(id: string): Promise<Geofence | null>;
  findByOwnerAndName(ownerId: string, name: string): Promise<Geofence | null>;
  findAllActive(): Promise<Geofence[]>;
  list(filters?: GeofenceListFilters): Promise<Geofence[]>;
}
