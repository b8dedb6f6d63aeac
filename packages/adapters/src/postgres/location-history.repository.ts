import type {
  HistoryPoint,
  HistoryStatistics,
  LocationHistoryBucket,
  LocationHistoryRepositoryPort,
  SaveResult,
} from '@cargotrace/domain';
import { conflict, saved } from '@cargotrace/domain';
import { getPool } from './pool.js';
import type { Queryable } from './pool.js';

/** Point timestamps are stored as epoch ms inside the JSONB column. */
interface StoredPoint {
  lat: number;
  lng: number;
  altitude?: number;
  speed?: number;
  heading?: number;
  ts: number;
}

type StoredStatistics = Omit<HistoryStatistics, 'lastUpdate'> & { lastUpdate?: number };

export class PgLocationHistoryRepository implements LocationHistoryRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async findBucket(shipmentId: string, date: string): Promise<LocationHistoryBucket | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.location_history WHERE shipment_id = $1 AND day = $2`,
      [shipmentId, date],
    );
    return rows[0] ? mapBucketRow(rows[0]) : null;
  }

  async saveBucket(
    bucket: LocationHistoryBucket,
    expectedVersion: number,
  ): Promise<SaveResult<LocationHistoryBucket>> {
    const next: LocationHistoryBucket = { ...bucket, version: expectedVersion + 1 };
    const params = [
      next.shipmentId,
      next.date,
      JSON.stringify(next.points.map(toStoredPoint)),
      JSON.stringify(toStoredStatistics(next.statistics)),
      next.createdAt,
      next.updatedAt,
      next.version,
    ];
    const { rowCount } =
      expectedVersion === 0
        ? await this.db.query(
            `INSERT INTO tracking.location_history
               (shipment_id, day, points, statistics, created_at, updated_at, version)
             VALUES ($1,$2,$3,$4,$5,$6,$7)
             ON CONFLICT (shipment_id, day) DO NOTHING`,
            params,
          )
        : await this.db.query(
            `UPDATE tracking.location_history SET
               points = $3, statistics = $4, created_at = $5, updated_at = $6, version = $7
             WHERE shipment_id = $1 AND day = $2 AND version = $8`,
            [...params, expectedVersion],
          );
    if (!rowCount) return conflict();
    return saved(next);
  }

  async findRange(
    shipmentId: string,
    fromDate: string,
    toDate: string,
  ): Promise<LocationHistoryBucket[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.location_history
       WHERE shipment_id = $1 AND day >= $2 AND day <= $3
       ORDER BY day`,
      [shipmentId, fromDate, toDate],
    );
    return rows.map(mapBucketRow);
  }

  async findOlderThan(date: string): Promise<LocationHistoryBucket[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.location_history WHERE day < $1 ORDER BY day, shipment_id`,
      [date],
    );
    return rows.map(mapBucketRow);
  }

  async deleteByShipment(shipmentId: string): Promise<number> {
    const { rowCount } = await this.db.query(
      `DELETE FROM tracking.location_history WHERE shipment_id = $1`,
      [shipmentId],
    );
    return rowCount ?? 0;
  }
}

function toStoredPoint(p: HistoryPoint): StoredPoint {
  return { ...p, ts: p.ts.getTime() };
}

function toStoredStatistics(s: HistoryStatistics): StoredStatistics {
  return { ...s, lastUpdate: s.lastUpdate?.getTime() };
}

function mapBucketRow(row: Record<string, unknown>): LocationHistoryBucket {
  const points = row['points'] as StoredPoint[];
  const stats = row['statistics'] as StoredStatistics;
  return {
    shipmentId: row['shipment_id'] as string,
    date: row['day'] as string,
    points: points.map((p) => ({ ...p, ts: new Date(p.ts) })),
    statistics: {
      ...stats,
      lastUpdate: stats.lastUpdate === undefined ? undefined : new Date(stats.lastUpdate),
    },
    createdAt: row['created_at'] as Date,
    updatedAt: row['updated_at'] as Date,
    version: row['version'] as number,
  };
}
