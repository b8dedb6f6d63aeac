/**
 * PgShipmentRepository against a scripted Queryable: verifies the SQL it
 * issues for version-checked writes and how rows map back to the aggregate.
 */

import { describe, it, expect } from '@jest/globals';

import type { Shipment } from '@cargotrace/domain';
import { PgShipmentRepository } from '../postgres/shipment.repository.js';
import type { Queryable, TransactionRunner } from '../postgres/pool.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

type Reply = { rows: Record<string, unknown>[]; rowCount: number | null };

class ScriptedDb implements Queryable {
  readonly calls: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly reply: (text: string) => Reply) {}

  async query(text: string, values: unknown[] = []): Promise<Reply> {
    this.calls.push({ text, values });
    return this.reply(text);
  }
}

const inline = (db: Queryable): TransactionRunner => (fn) => fn(db);

const T0 = new Date('2025-02-01T09:00:00.000Z');

function makeShipment(overrides: Partial<Shipment> = {}): Shipment {
  return {
    id: 'shp-1',
    shipmentNumber: 'SHP-1',
    customerId: 'cust-1',
    carrierId: 'car-1',
    status: 'CONFIRMED',
    mode: 'TRUCK_LTL',
    origin: { line1: 'a', city: 'Newark', country: 'US' },
    destination: { line1: 'b', city: 'Boston', country: 'US' },
    plannedPickupTime: T0,
    plannedDeliveryTime: new Date('2025-02-02T09:00:00.000Z'),
    stops: [
      {
        id: 'stop-1',
        sequenceNumber: 1,
        type: 'DELIVERY',
        location: { line1: 'b', city: 'Boston', country: 'US' },
        status: 'PENDING',
      },
    ],
    events: [{ id: 'ev-1', type: 'CREATED', occurredAt: T0, description: 'created', actor: 'ops' }],
    tags: ['fragile'],
    createdAt: T0,
    updatedAt: T0,
    version: 2,
    ...overrides,
  };
}

// ─── save ─────────────────────────────────────────────────────────────────────

describe('PgShipmentRepository.save', () => {
  it('reports a version conflict when the conditional UPDATE touches no row', async () => {
    const db = new ScriptedDb(() => ({ rows: [], rowCount: 0 }));
    const repo = new PgShipmentRepository(db, inline(db));

    const result = await repo.save(makeShipment(), 2);

    expect(result).toEqual({ ok: false, reason: 'version_conflict' });
    expect(db.calls).toHaveLength(1);
    expect(db.calls[0]?.text).toContain('WHERE id = $1 AND version = $21');
    expect(db.calls[0]?.values[20]).toBe(2);
  });

  it('reports a duplicate when the INSERT is skipped', async () => {
    const db = new ScriptedDb(() => ({ rows: [], rowCount: 0 }));
    const repo = new PgShipmentRepository(db, inline(db));

    const result = await repo.save(makeShipment({ version: 0 }), 0);

    expect(result).toEqual({ ok: false, reason: 'duplicate' });
    expect(db.calls[0]?.text).toContain('INSERT INTO tracking.shipments');
  });

  it('rewrites stops, appends events and bumps the version', async () => {
    const db = new ScriptedDb(() => ({ rows: [], rowCount: 1 }));
    const repo = new PgShipmentRepository(db, inline(db));

    const result = await repo.save(makeShipment(), 2);

    expect(result.ok && result.value.version).toBe(3);
    expect(db.calls.map((c) => c.text.trim().split(/\s+/).slice(0, 3).join(' '))).toEqual([
      'UPDATE tracking.shipments SET',
      'DELETE FROM tracking.shipment_stops',
      'INSERT INTO tracking.shipment_stops',
      'INSERT INTO tracking.shipment_events',
    ]);
    expect(db.calls[0]?.values[19]).toBe(3);
    expect(db.calls[2]?.values.slice(0, 4)).toEqual(['stop-1', 'shp-1', 1, 'DELIVERY']);
  });
});

// ─── reads ────────────────────────────────────────────────────────────────────

describe('PgShipmentRepository.findById', () => {
  it('assembles the aggregate from its three tables', async () => {
    const db = new ScriptedDb((text) => {
      if (text.includes('tracking.shipment_stops')) {
        return {
          rowCount: 1,
          rows: [
            {
              id: 'stop-1',
              shipment_id: 'shp-1',
              sequence_number: 1,
              type: 'DELIVERY',
              location: { line1: 'b', city: 'Boston', country: 'US' },
              geofence_id: null,
              planned_arrival: null,
              actual_arrival: T0,
              planned_departure: null,
              actual_departure: null,
              reference_number: 'PO-9',
              contact_name: null,
              notes: null,
              status: 'ARRIVED',
            },
          ],
        };
      }
      if (text.includes('tracking.shipment_events')) return { rowCount: 0, rows: [] };
      return {
        rowCount: 1,
        rows: [
          {
            id: 'shp-1',
            shipment_number: 'SHP-1',
            customer_id: 'cust-1',
            carrier_id: 'car-1',
            status: 'IN_TRANSIT',
            mode: 'AIR',
            origin: { line1: 'a', city: 'Newark', country: 'US' },
            destination: { line1: 'b', city: 'Boston', country: 'US' },
            planned_pickup_time: T0,
            planned_delivery_time: T0,
            actual_pickup_time: T0,
            actual_delivery_time: null,
            estimated_delivery_time: null,
            cancel_saga_id: 'saga-7',
            cancel_requested_at: T0,
            cancel_reason: 'customer request',
            tags: ['fragile'],
            created_at: T0,
            updated_at: T0,
            version: 5,
          },
        ],
      };
    });
    const repo = new PgShipmentRepository(db, inline(db));

    const shipment = await repo.findById('shp-1');

    expect(shipment?.status).toBe('IN_TRANSIT');
    expect(shipment?.version).toBe(5);
    expect(shipment?.actualDeliveryTime).toBeUndefined();
    expect(shipment?.pendingCancellation).toEqual({
      sagaId: 'saga-7',
      requestedAt: T0,
      reason: 'customer request',
    });
    expect(shipment?.stops).toEqual([
      {
        id: 'stop-1',
        sequenceNumber: 1,
        type: 'DELIVERY',
        location: { line1: 'b', city: 'Boston', country: 'US' },
        geofenceId: undefined,
        plannedArrival: undefined,
        actualArrival: T0,
        plannedDeparture: undefined,
        actualDeparture: undefined,
        referenceNumber: 'PO-9',
        contactName: undefined,
        notes: undefined,
        status: 'ARRIVED',
      },
    ]);
    expect(shipment?.events).toEqual([]);
  });

  it('returns null without touching child tables when the row is missing', async () => {
    const db = new ScriptedDb(() => ({ rows: [], rowCount: 0 }));
    const repo = new PgShipmentRepository(db, inline(db));

    expect(await repo.findById('missing')).toBeNull();
    expect(db.calls).toHaveLength(1);
  });
});
