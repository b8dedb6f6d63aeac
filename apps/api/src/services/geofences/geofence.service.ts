import { v4 as uuidv4 } from 'uuid';
import type {
  Geofence,
  GeofenceListFilters,
  GeofenceNotificationPolicy,
  GeofenceRepositoryPort,
  GeofenceShape,
} from '@cargotrace/domain';
import {
  ConcurrentModificationError,
  DEFAULT_NOTIFICATION_POLICY,
  DuplicateResourceError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  validateGeofence,
} from '@cargotrace/domain';
import type { Clock } from '@cargotrace/adapters';
import { wallClockNow } from '@cargotrace/adapters';

export interface CreateGeofenceInput {
  name: string;
  ownerId: string;
  shape: GeofenceShape;
  tags?: string[];
  notification?: Partial<GeofenceNotificationPolicy>;
  priority?: number;
  active?: boolean;
}

export class GeofenceService {
  private readonly clock: Clock;
  private readonly newId: () => string;

  constructor(
    private readonly geofences: GeofenceRepositoryPort,
    opts: { clock?: Clock; newId?: () => string } = {},
  ) {
    this.clock = opts.clock ?? wallClockNow;
    this.newId = opts.newId ?? uuidv4;
  }

  async create(input: CreateGeofenceInput): Promise<Geofence> {
    const now = this.clock();
    const fence: Geofence = {
      id: this.newId(),
      name: input.name.trim(),
      ownerId: input.ownerId,
      shape: input.shape,
      active: input.active ?? true,
      tags: input.tags ?? [],
      notification: { ...DEFAULT_NOTIFICATION_POLICY, ...input.notification },
      priority: input.priority ?? 0,
      createdAt: now,
      updatedAt: now,
      version: 0,
    };
    validateGeofence(fence);

    if (await this.geofences.findByOwnerAndName(fence.ownerId, fence.name)) {
      throw this.duplicate(fence);
    }
    const result = await this.geofences.save(fence, 0);
    if (!result.ok) throw this.duplicate(fence);

    console.log(`[geofence-service] created ${fence.shape.kind} geofence "${fence.name}" (${fence.id})`);
    return result.value;
  }

  async get(id: string): Promise<Geofence> {
    const fence = await this.geofences.findById(id);
    if (!fence) throw new NotFoundError('Geofence', id);
    return fence;
  }

  list(filters: GeofenceListFilters = {}): Promise<Geofence[]> {
    return this.geofences.list(filters);
  }

  listActive(): Promise<Geofence[]> {
    return this.geofences.findAllActive();
  }

  activate(id: string): Promise<Geofence> {
    return this.setActive(id, true);
  }

  deactivate(id: string): Promise<Geofence> {
    return this.setActive(id, false);
  }

  async updateRadius(id: string, radiusMeters: number): Promise<Geofence> {
    const current = await this.get(id);
    if (current.shape.kind !== 'circle') {
      throw new InvalidArgumentError(`Geofence ${id} is a ${current.shape.kind}; only circles have a radius`);
    }
    const next: Geofence = {
      ...current,
      shape: { ...current.shape, radiusMeters },
      updatedAt: this.clock(),
    };
    validateGeofence(next);
    return this.persist(current, next);
  }

  private async setActive(id: string, active: boolean): Promise<Geofence> {
    const current = await this.get(id);
    if (current.active === active) {
      throw new InvalidStateError(`Geofence ${id} is already ${active ? 'active' : 'inactive'}`);
    }
    return this.persist(current, { ...current, active, updatedAt: this.clock() });
  }

  private async persist(current: Geofence, next: Geofence): Promise<Geofence> {
    const result = await this.geofences.save(next, current.version);
    if (result.ok) return result.value;
    if (result.reason === 'duplicate') throw this.duplicate(next);
    throw new ConcurrentModificationError('Geofence', current.id);
  }

  private duplicate(fence: Geofence): DuplicateResourceError {
    return new DuplicateResourceError(
      `Owner ${fence.ownerId} already has a geofence named "${fence.name}"`,
    );
  }
}
