import type {
  DomainEvent,
  DomainEventKind,
  EventStreamPort,
  Milestone,
  RecordedEvent,
} from '@cargotrace/domain';
import { getPool } from './pool.js';
import type { Queryable } from './pool.js';

export class PgEventStreamAdapter implements EventStreamPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async initialize(shipmentId: string, at: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.event_streams (shipment_id, created_at) VALUES ($1, $2)
       ON CONFLICT (shipment_id) DO NOTHING`,
      [shipmentId, at],
    );
  }

  async record(event: DomainEvent): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.stream_events (event_id, shipment_id, kind, occurred_at, payload)
       VALUES ($1,$2,$3,$4,$5)
       ON CONFLICT (event_id) DO NOTHING`,
      [event.eventId, event.aggregateId, event.kind, event.occurredAt, JSON.stringify(event.payload)],
    );
  }

  async createMilestone(milestone: Milestone): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.milestones (event_id, shipment_id, description, occurred_at)
       VALUES ($1,$2,$3,$4)
       ON CONFLICT (event_id) DO NOTHING`,
      [milestone.eventId, milestone.shipmentId, milestone.description, milestone.occurredAt],
    );
  }

  async listEvents(shipmentId: string): Promise<RecordedEvent[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.stream_events WHERE shipment_id = $1 ORDER BY occurred_at, event_id`,
      [shipmentId],
    );
    return rows.map((row) => ({
      eventId: row['event_id'] as string,
      shipmentId: row['shipment_id'] as string,
      kind: row['kind'] as DomainEventKind,
      occurredAt: row['occurred_at'] as Date,
      payload: row['payload'] as Record<string, unknown>,
    }));
  }

  async listMilestones(shipmentId: string): Promise<Milestone[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.milestones WHERE shipment_id = $1 ORDER BY occurred_at, event_id`,
      [shipmentId],
    );
    return rows.map((row) => ({
      eventId: row['event_id'] as string,
      shipmentId: row['shipment_id'] as string,
      description: row['description'] as string,
      occurredAt: row['occurred_at'] as Date,
    }));
  }
}
