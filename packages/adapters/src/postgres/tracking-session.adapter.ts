import type { TrackingSession, TrackingSessionPort, TrackingSessionState } from '@cargotrace/domain';
import { getPool } from './pool.js';
import type { Queryable } from './pool.js';

export class PgTrackingSessionAdapter implements TrackingSessionPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async start(shipmentId: string, at: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.tracking_sessions (shipment_id, state, started_at, updated_at)
       VALUES ($1, 'ACTIVE', $2, $2)
       ON CONFLICT (shipment_id) DO NOTHING`,
      [shipmentId, at],
    );
  }

  async stop(shipmentId: string, at: Date): Promise<void> {
    await this.setState(shipmentId, 'STOPPED', at);
  }

  async resume(shipmentId: string, at: Date): Promise<void> {
    await this.setState(shipmentId, 'ACTIVE', at);
  }

  async get(shipmentId: string): Promise<TrackingSession | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.tracking_sessions WHERE shipment_id = $1`,
      [shipmentId],
    );
    const row = rows[0];
    if (!row) return null;
    return {
      shipmentId: row['shipment_id'] as string,
      state: row['state'] as TrackingSessionState,
      startedAt: row['started_at'] as Date,
      updatedAt: row['updated_at'] as Date,
    };
  }

  private async setState(shipmentId: string, state: TrackingSessionState, at: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.tracking_sessions (shipment_id, state, started_at, updated_at)
       VALUES ($1, $2, $3, $3)
       ON CONFLICT (shipment_id) DO UPDATE SET state = EXCLUDED.state, updated_at = EXCLUDED.updated_at`,
      [shipmentId, state, at],
    );
  }
}
