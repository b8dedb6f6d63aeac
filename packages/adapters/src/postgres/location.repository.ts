import type {
  Address,
  GeoPoint,
  GeofenceTransition,
  LatestLocation,
  Location,
  LocationQuality,
  LocationRepositoryPort,
  SaveResult,
} from '@cargotrace/domain';
import { EARTH_RADIUS_KM, conflict, saved } from '@cargotrace/domain';
import { getPool } from './pool.js';
import type { Queryable } from './pool.js';
import { opt, orNull } from './sql.js';

const COLUMNS = `id, shipment_id, device_id, latitude, longitude, altitude, speed, heading, accuracy,
  ts, received_at, quality, is_moving, geofence_id, geofence_transition, geofence_entered_at,
  geofence_dwell_notified, nearest_stop_id, nearest_stop_km, address, metadata`;

const PLACEHOLDERS = Array.from({ length: 21 }, (_, i) => `$${i + 1}`).join(',');

export class PgLocationRepository implements LocationRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async insert(location: Location): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.locations (${COLUMNS}) VALUES (${PLACEHOLDERS})
       ON CONFLICT (id) DO NOTHING`,
      locationParams(location),
    );
  }

  async findById(id: string): Promise<Location | null> {
    const { rows } = await this.db.query(`SELECT * FROM tracking.locations WHERE id = $1`, [id]);
    return rows[0] ? mapLocationRow(rows[0]) : null;
  }

  async updateAddress(id: string, address: Address): Promise<Location | null> {
    const json = JSON.stringify(address);
    const { rows } = await this.db.query(
      `UPDATE tracking.locations SET address = $2 WHERE id = $1 RETURNING *`,
      [id, json],
    );
    // the projection only mirrors the address when it still points at this report
    await this.db.query(`UPDATE tracking.location_latest SET address = $2 WHERE id = $1`, [id, json]);
    return rows[0] ? mapLocationRow(rows[0]) : null;
  }

  async findHistory(shipmentId: string, from: Date, to: Date): Promise<Location[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.locations
       WHERE shipment_id = $1 AND ts >= $2 AND ts <= $3
       ORDER BY ts, id`,
      [shipmentId, from, to],
    );
    return rows.map(mapLocationRow);
  }

  async deleteByShipment(shipmentId: string): Promise<number> {
    await this.db.query(`DELETE FROM tracking.location_latest WHERE shipment_id = $1`, [shipmentId]);
    const { rowCount } = await this.db.query(
      `DELETE FROM tracking.locations WHERE shipment_id = $1`,
      [shipmentId],
    );
    return rowCount ?? 0;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const { rowCount } = await this.db.query(`DELETE FROM tracking.locations WHERE ts < $1`, [cutoff]);
    return rowCount ?? 0;
  }

  async getLatest(shipmentId: string): Promise<LatestLocation | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.location_latest WHERE shipment_id = $1`,
      [shipmentId],
    );
    const row = rows[0];
    return row ? { location: mapLocationRow(row), version: row['version'] as number } : null;
  }

  async saveLatest(location: Location, expectedVersion: number): Promise<SaveResult<LatestLocation>> {
    const version = expectedVersion + 1;
    const { rowCount } =
      expectedVersion === 0
        ? await this.db.query(
            `INSERT INTO tracking.location_latest (${COLUMNS}, version)
             VALUES (${PLACEHOLDERS}, $22)
             ON CONFLICT (shipment_id) DO NOTHING`,
            [...locationParams(location), version],
          )
        : await this.db.query(
            `UPDATE tracking.location_latest SET
               id = $1, device_id = $3, latitude = $4, longitude = $5, altitude = $6, speed = $7,
               heading = $8, accuracy = $9, ts = $10, received_at = $11, quality = $12,
               is_moving = $13, geofence_id = $14, geofence_transition = $15,
               geofence_entered_at = $16, geofence_dwell_notified = $17, nearest_stop_id = $18,
               nearest_stop_km = $19, address = $20, metadata = $21, version = $22
             WHERE shipment_id = $2 AND version = $23`,
            [...locationParams(location), version, expectedVersion],
          );
    if (!rowCount) return conflict();
    return saved({ location, version });
  }

  async findLatestNear(point: GeoPoint, radiusKm: number, since?: Date): Promise<Location[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM (
         SELECT *, 2 * $5 * asin(sqrt(
           power(sin(radians(latitude - $1) / 2), 2) +
           cos(radians($1)) * cos(radians(latitude)) * power(sin(radians(longitude - $2) / 2), 2)
         )) AS distance_km
         FROM tracking.location_latest
         WHERE ($4::timestamptz IS NULL OR ts >= $4)
       ) nearby
       WHERE distance_km <= $3
       ORDER BY distance_km, shipment_id`,
      [point.lat, point.lng, radiusKm, orNull(since), EARTH_RADIUS_KM],
    );
    return rows.map(mapLocationRow);
  }

  async findMovingSince(since: Date): Promise<Location[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.location_latest
       WHERE is_moving AND ts >= $1
       ORDER BY ts DESC`,
      [since],
    );
    return rows.map(mapLocationRow);
  }
}

function locationParams(l: Location): unknown[] {
  return [
    l.id,
    l.shipmentId,
    l.deviceId,
    l.latitude,
    l.longitude,
    orNull(l.altitude),
    orNull(l.speed),
    orNull(l.heading),
    orNull(l.accuracy),
    l.timestamp,
    l.receivedAt,
    l.quality,
    l.isMoving,
    orNull(l.geofence?.geofenceId),
    orNull(l.geofence?.transition),
    orNull(l.geofence?.enteredAt),
    orNull(l.geofence?.dwellNotified),
    orNull(l.nearestStop?.stopId),
    orNull(l.nearestStop?.distanceKm),
    l.address ? JSON.stringify(l.address) : null,
    JSON.stringify(l.metadata),
  ];
}

export function mapLocationRow(row: Record<string, unknown>): Location {
  const geofenceId = opt<string>(row['geofence_id']);
  const nearestStopId = opt<string>(row['nearest_stop_id']);
  return {
    id: row['id'] as string,
    shipmentId: row['shipment_id'] as string,
    deviceId: row['device_id'] as string,
    latitude: row['latitude'] as number,
    longitude: row['longitude'] as number,
    altitude: opt<number>(row['altitude']),
    speed: opt<number>(row['speed']),
    heading: opt<number>(row['heading']),
    accuracy: opt<number>(row['accuracy']),
    timestamp: row['ts'] as Date,
    receivedAt: row['received_at'] as Date,
    quality: row['quality'] as LocationQuality,
    isMoving: row['is_moving'] as boolean,
    geofence: geofenceId
      ? {
          geofenceId,
          transition: row['geofence_transition'] as GeofenceTransition,
          enteredAt: row['geofence_entered_at'] as Date,
          dwellNotified: (row['geofence_dwell_notified'] as boolean | null) ?? false,
        }
      : undefined,
    nearestStop: nearestStopId
      ? { stopId: nearestStopId, distanceKm: row['nearest_stop_km'] as number }
      : undefined,
    address: opt<Address>(row['address']),
    metadata: (row['metadata'] as Record<string, unknown> | null) ?? {},
  };
}
