import type {
  Geofence,
  GeofenceListFilters,
  GeofenceNotificationPolicy,
  GeofenceRepositoryPort,
  GeofenceShape,
  SaveResult,
} from '@cargotrace/domain';
import { conflict, saved } from '@cargotrace/domain';
import { getPool, isUniqueViolation } from './pool.js';
import type { Queryable } from './pool.js';

export class PgGeofenceRepository implements GeofenceRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async save(fence: Geofence, expectedVersion: number): Promise<SaveResult<Geofence>> {
    const next: Geofence = { ...fence, version: expectedVersion + 1 };
    const params = [
      next.id,
      next.name,
      next.ownerId,
      JSON.stringify(next.shape),
      next.active,
      [...next.tags],
      JSON.stringify(next.notification),
      next.priority,
      next.createdAt,
      next.updatedAt,
      next.version,
    ];
    try {
      const { rowCount } =
        expectedVersion === 0
          ? await this.db.query(
              `INSERT INTO tracking.geofences
                 (id, name, owner_id, shape, active, tags, notification, priority,
                  created_at, updated_at, version)
               VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)`,
              params,
            )
          : await this.db.query(
              `UPDATE tracking.geofences SET
                 name = $2, owner_id = $3, shape = $4, active = $5, tags = $6, notification = $7,
                 priority = $8, created_at = $9, updated_at = $10, version = $11
               WHERE id = $1 AND version = $12`,
              [...params, expectedVersion],
            );
      if (!rowCount) return conflict();
      return saved(next);
    } catch (err) {
      if (isUniqueViolation(err)) return conflict('duplicate');
      throw err;
    }
  }

  async findById(id: string): Promise<Geofence | null> {
    const { rows } = await this.db.query(`SELECT * FROM tracking.geofences WHERE id = $1`, [id]);
    return rows[0] ? mapGeofenceRow(rows[0]) : null;
  }

  async findByOwnerAndName(ownerId: string, name: string): Promise<Geofence | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.geofences WHERE owner_id = $1 AND name = $2`,
      [ownerId, name],
    );
    return rows[0] ? mapGeofenceRow(rows[0]) : null;
  }

  async findAllActive(): Promise<Geofence[]> {
    return this.list({ active: true });
  }

  async list(filters: GeofenceListFilters = {}): Promise<Geofence[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.ownerId) {
      conditions.push(`owner_id = $${idx++}`);
      params.push(filters.ownerId);
    }
    if (filters.active !== undefined) {
      conditions.push(`active = $${idx++}`);
      params.push(filters.active);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.geofences ${where} ORDER BY priority DESC, id`,
      params,
    );
    return rows.map(mapGeofenceRow);
  }
}

function mapGeofenceRow(row: Record<string, unknown>): Geofence {
  return {
    id: row['id'] as string,
    name: row['name'] as string,
    ownerId: row['owner_id'] as string,
    shape: row['shape'] as GeofenceShape,
    active: row['active'] as boolean,
    tags: (row['tags'] as string[] | null) ?? [],
    notification: row['notification'] as GeofenceNotificationPolicy,
    priority: row['priority'] as number,
    createdAt: row['created_at'] as Date,
    updatedAt: row['updated_at'] as Date,
    version: row['version'] as number,
  };
}
