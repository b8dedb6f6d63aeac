import type {
  Address,
  SaveResult,
  Shipment,
  ShipmentEvent,
  ShipmentListFilters,
  ShipmentMode,
  ShipmentRepositoryPort,
  ShipmentStatus,
  Stop,
  StopStatus,
  StopType,
} from '@cargotrace/domain';
import { conflict, saved } from '@cargotrace/domain';
import { getPool, withTransaction } from './pool.js';
import type { Queryable, TransactionRunner } from './pool.js';
import { opt, orNull, valuesClause } from './sql.js';

const STOP_COLUMNS = 14;
const EVENT_COLUMNS = 6;

export class PgShipmentRepository implements ShipmentRepositoryPort {
  constructor(
    private readonly db: Queryable = getPool(),
    private readonly tx: TransactionRunner = withTransaction,
  ) {}

  async save(shipment: Shipment, expectedVersion: number): Promise<SaveResult<Shipment>> {
    const next: Shipment = { ...shipment, version: expectedVersion + 1 };

    return this.tx(async (db) => {
      const { rowCount } =
        expectedVersion === 0
          ? await db.query(
              `INSERT INTO tracking.shipments
                 (id, shipment_number, customer_id, carrier_id, status, mode, origin, destination,
                  planned_pickup_time, planned_delivery_time, actual_pickup_time, actual_delivery_time,
                  estimated_delivery_time, cancel_saga_id, cancel_requested_at, cancel_reason,
                  tags, created_at, updated_at, version)
               VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20)
               ON CONFLICT DO NOTHING`,
              shipmentParams(next),
            )
          : await db.query(
              `UPDATE tracking.shipments SET
                 shipment_number = $2, customer_id = $3, carrier_id = $4, status = $5, mode = $6,
                 origin = $7, destination = $8, planned_pickup_time = $9, planned_delivery_time = $10,
                 actual_pickup_time = $11, actual_delivery_time = $12, estimated_delivery_time = $13,
                 cancel_saga_id = $14, cancel_requested_at = $15, cancel_reason = $16,
                 tags = $17, created_at = $18, updated_at = $19, version = $20
               WHERE id = $1 AND version = $21`,
              [...shipmentParams(next), expectedVersion],
            );

      if (!rowCount) return conflict<Shipment>(expectedVersion === 0 ? 'duplicate' : 'version_conflict');

      await db.query(`DELETE FROM tracking.shipment_stops WHERE shipment_id = $1`, [next.id]);
      if (next.stops.length > 0) {
        await db.query(
          `INSERT INTO tracking.shipment_stops
             (id, shipment_id, sequence_number, type, location, geofence_id, planned_arrival,
              actual_arrival, planned_departure, actual_departure, reference_number, contact_name,
              notes, status)
           VALUES ${valuesClause(next.stops.length, STOP_COLUMNS)}`,
          next.stops.flatMap((s) => stopParams(next.id, s)),
        );
      }
      if (next.events.length > 0) {
        await db.query(
          `INSERT INTO tracking.shipment_events
             (id, shipment_id, type, occurred_at, description, actor)
           VALUES ${valuesClause(next.events.length, EVENT_COLUMNS)}
           ON CONFLICT (id) DO NOTHING`,
          next.events.flatMap((e) => [e.id, next.id, e.type, e.occurredAt, e.description, e.actor]),
        );
      }
      return saved(next);
    });
  }

  async findById(id: string): Promise<Shipment | null> {
    const { rows } = await this.db.query(`SELECT * FROM tracking.shipments WHERE id = $1`, [id]);
    const [shipment] = await this.hydrate(rows);
    return shipment ?? null;
  }

  async findByShipmentNumber(shipmentNumber: string): Promise<Shipment | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.shipments WHERE shipment_number = $1`,
      [shipmentNumber],
    );
    const [shipment] = await this.hydrate(rows);
    return shipment ?? null;
  }

  async list(filters: ShipmentListFilters = {}): Promise<Shipment[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.status) {
      conditions.push(`status = $${idx++}`);
      params.push(filters.status);
    }
    if (filters.customerId) {
      conditions.push(`customer_id = $${idx++}`);
      params.push(filters.customerId);
    }
    if (filters.carrierId) {
      conditions.push(`carrier_id = $${idx++}`);
      params.push(filters.carrierId);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = filters.limit ?? 100;
    const offset = filters.offset ?? 0;

    const { rows } = await this.db.query(
      `SELECT * FROM tracking.shipments ${where}
       ORDER BY created_at DESC, id LIMIT $${idx++} OFFSET $${idx++}`,
      [...params, limit, offset],
    );
    return this.hydrate(rows);
  }

  async delete(id: string): Promise<boolean> {
    const { rowCount } = await this.db.query(`DELETE FROM tracking.shipments WHERE id = $1`, [id]);
    return (rowCount ?? 0) > 0;
  }

  private async hydrate(rows: Record<string, unknown>[]): Promise<Shipment[]> {
    if (rows.length === 0) return [];
    const ids = rows.map((r) => r['id'] as string);
    const [stops, events] = await Promise.all([
      this.db.query(
        `SELECT * FROM tracking.shipment_stops WHERE shipment_id = ANY($1) ORDER BY sequence_number`,
        [ids],
      ),
      this.db.query(
        `SELECT * FROM tracking.shipment_events WHERE shipment_id = ANY($1) ORDER BY occurred_at, id`,
        [ids],
      ),
    ]);
    return rows.map((row) => {
      const id = row['id'] as string;
      return mapShipmentRow(
        row,
        stops.rows.filter((s) => s['shipment_id'] === id).map(mapStopRow),
        events.rows.filter((e) => e['shipment_id'] === id).map(mapEventRow),
      );
    });
  }
}

function shipmentParams(s: Shipment): unknown[] {
  return [
    s.id,
    s.shipmentNumber,
    s.customerId,
    s.carrierId,
    s.status,
    s.mode,
    JSON.stringify(s.origin),
    JSON.stringify(s.destination),
    s.plannedPickupTime,
    s.plannedDeliveryTime,
    orNull(s.actualPickupTime),
    orNull(s.actualDeliveryTime),
    orNull(s.estimatedDeliveryTime),
    orNull(s.pendingCancellation?.sagaId),
    orNull(s.pendingCancellation?.requestedAt),
    orNull(s.pendingCancellation?.reason),
    [...s.tags],
    s.createdAt,
    s.updatedAt,
    s.version,
  ];
}

function stopParams(shipmentId: string, s: Stop): unknown[] {
  return [
    s.id,
    shipmentId,
    s.sequenceNumber,
    s.type,
    JSON.stringify(s.location),
    orNull(s.geofenceId),
    orNull(s.plannedArrival),
    orNull(s.actualArrival),
    orNull(s.plannedDeparture),
    orNull(s.actualDeparture),
    orNull(s.referenceNumber),
    orNull(s.contactName),
    orNull(s.notes),
    s.status,
  ];
}

export function mapShipmentRow(
  row: Record<string, unknown>,
  stops: Stop[],
  events: ShipmentEvent[],
): Shipment {
  const sagaId = opt<string>(row['cancel_saga_id']);
  return {
    id: row['id'] as string,
    shipmentNumber: row['shipment_number'] as string,
    customerId: row['customer_id'] as string,
    carrierId: row['carrier_id'] as string,
    status: row['status'] as ShipmentStatus,
    mode: row['mode'] as ShipmentMode,
    origin: row['origin'] as Address,
    destination: row['destination'] as Address,
    plannedPickupTime: row['planned_pickup_time'] as Date,
    plannedDeliveryTime: row['planned_delivery_time'] as Date,
    actualPickupTime: opt<Date>(row['actual_pickup_time']),
    actualDeliveryTime: opt<Date>(row['actual_delivery_time']),
    estimatedDeliveryTime: opt<Date>(row['estimated_delivery_time']),
    pendingCancellation: sagaId
      ? {
          sagaId,
          requestedAt: row['cancel_requested_at'] as Date,
          reason: row['cancel_reason'] as string,
        }
      : undefined,
    stops,
    events,
    tags: (row['tags'] as string[] | null) ?? [],
    createdAt: row['created_at'] as Date,
    updatedAt: row['updated_at'] as Date,
    version: row['version'] as number,
  };
}

function mapStopRow(row: Record<string, unknown>): Stop {
  return {
    id: row['id'] as string,
    sequenceNumber: row['sequence_number'] as number,
    type: row['type'] as StopType,
    location: row['location'] as Address,
    geofenceId: opt<string>(row['geofence_id']),
    plannedArrival: opt<Date>(row['planned_arrival']),
    actualArrival: opt<Date>(row['actual_arrival']),
    plannedDeparture: opt<Date>(row['planned_departure']),
    actualDeparture: opt<Date>(row['actual_departure']),
    referenceNumber: opt<string>(row['reference_number']),
    contactName: opt<string>(row['contact_name']),
    notes: opt<string>(row['notes']),
    status: row['status'] as StopStatus,
  };
}

function mapEventRow(row: Record<string, unknown>): ShipmentEvent {
  return {
    id: row['id'] as string,
    type: row['type'] as string,
    occurredAt: row['occurred_at'] as Date,
    description: row['description'] as string,
    actor: row['actor'] as string,
  };
}
