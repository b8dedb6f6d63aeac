/**
 * Shipment state machine tests
 *
 * Every (from, to) pair is checked against the transition table, plus the
 * dispatch/deliver guards, stop lifecycle and the cancellation marker.
 */

import { describe, it, expect } from '@jest/globals';

import {
  SHIPMENT_STATUSES,
  InvalidArgumentError,
  InvalidStateError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionFailedError,
  abortCancellation,
  addStop,
  beginCancellation,
  canTransition,
  cancel,
  confirm,
  createShipment,
  deliver,
  dispatch,
  isTerminalStatus,
  removeStop,
  transition,
  updateEstimatedDelivery,
  updateStopStatus,
} from '../index.js';
import type { NewShipmentInput, RuleContext, Shipment, ShipmentStatus } from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function makeCtx(at = '2025-01-02T10:00:00.000Z'): RuleContext {
  let n = 0;
  return { actor: 'dispatcher-1', at: new Date(at), nextId: () => `id-${++n}` };
}

function makeInput(overrides: Partial<NewShipmentInput> = {}): NewShipmentInput {
  return {
    shipmentNumber: 'SHP-1001',
    customerId: 'cust-1',
    carrierId: 'carrier-1',
    mode: 'TRUCK_FTL',
    origin: { line1: '1 Dock St', city: 'Newark', country: 'US', lat: 40.73, lng: -74.17 },
    destination: { line1: '9 Bay Rd', city: 'Boston', country: 'US', lat: 42.36, lng: -71.06 },
    plannedPickupTime: new Date('2025-01-01T08:00:00.000Z'),
    plannedDeliveryTime: new Date('2025-01-03T08:00:00.000Z'),
    ...overrides,
  };
}

function shipmentIn(status: ShipmentStatus): Shipment {
  const { shipment } = createShipment(
    'shp-1',
    makeInput({
      stops: [
        {
          sequenceNumber: 1,
          type: 'DELIVERY',
          location: { line1: '9 Bay Rd', city: 'Boston', country: 'US', lat: 42.36, lng: -71.06 },
        },
      ],
    }),
    makeCtx('2025-01-01T07:00:00.000Z'),
  );
  return {
    ...shipment,
    status,
    version: 3,
    actualPickupTime: new Date('2025-01-01T08:00:00.000Z'),
  };
}

// ─── Factory ─────────────────────────────────────────────────────────────────

describe('createShipment', () => {
  it('rejects a planned delivery before the planned pickup', () => {
    expect(() =>
      createShipment(
        'shp-1',
        makeInput({
          plannedPickupTime: new Date('2025-01-01T08:00:00.000Z'),
          plannedDeliveryTime: new Date('2025-01-01T07:00:00.000Z'),
        }),
        makeCtx(),
      ),
    ).toThrow(InvalidArgumentError);
  });

  it('rejects an empty shipment number', () => {
    expect(() => createShipment('shp-1', makeInput({ shipmentNumber: '  ' }), makeCtx())).toThrow(
      InvalidArgumentError,
    );
  });

  it('rejects identical origin and destination', () => {
    const input = makeInput();
    expect(() =>
      createShipment('shp-1', { ...input, destination: input.origin }, makeCtx()),
    ).toThrow(InvalidArgumentError);
  });

  it('rejects duplicate stop sequence numbers', () => {
    const location = { line1: 'x', city: 'y', country: 'US' };
    expect(() =>
      createShipment(
        'shp-1',
        makeInput({
          stops: [
            { sequenceNumber: 1, type: 'PICKUP', location },
            { sequenceNumber: 1, type: 'DELIVERY', location },
          ],
        }),
        makeCtx(),
      ),
    ).toThrow(InvalidArgumentError);
  });

  it('starts CREATED at version 0 and emits ShipmentCreated', () => {
    const { shipment, events } = createShipment('shp-1', makeInput(), makeCtx());
    expect(shipment.status).toBe('CREATED');
    expect(shipment.version).toBe(0);
    expect(shipment.events).toHaveLength(1);
    expect(events).toHaveLength(1);
    expect(events[0]?.kind).toBe('ShipmentCreated');
    expect(events[0]?.aggregateId).toBe('shp-1');
    expect(events[0]?.aggregateVersion).toBe(1);
  });
});

// ─── Transition table ────────────────────────────────────────────────────────

describe('transition table', () => {
  for (const from of SHIPMENT_STATUSES) {
    for (const to of SHIPMENT_STATUSES) {
      if (canTransition(from, to)) {
        it(`${from} -> ${to} succeeds with exactly one event`, () => {
          const before = shipmentIn(from);
          const { shipment, events } = transition(before, to, makeCtx());
          expect(shipment.status).toBe(to);
          expect(events).toHaveLength(1);
          expect(shipment.events).toHaveLength(before.events.length + 1);
        });
      } else if (isTerminalStatus(from)) {
        it(`${from} -> ${to} fails with InvalidState`, () => {
          expect(() => transition(shipmentIn(from), to, makeCtx())).toThrow(InvalidStateError);
        });
      } else {
        it(`${from} -> ${to} fails with InvalidTransition and leaves the shipment unchanged`, () => {
          const before = shipmentIn(from);
          const copy = structuredClone(before);
          expect(() => transition(before, to, makeCtx())).toThrow(InvalidTransitionError);
          expect(before).toEqual(copy);
        });
      }
    }
  }

  it('maps each target to its event kind', () => {
    expect(transition(shipmentIn('CREATED'), 'CONFIRMED', makeCtx()).events[0]?.kind).toBe(
      'ShipmentStatusChanged',
    );
    expect(transition(shipmentIn('CONFIRMED'), 'DISPATCHED', makeCtx()).events[0]?.kind).toBe(
      'ShipmentDispatched',
    );
    expect(transition(shipmentIn('IN_TRANSIT'), 'DELIVERED', makeCtx()).events[0]?.kind).toBe(
      'ShipmentDelivered',
    );
    expect(transition(shipmentIn('EXCEPTION'), 'CANCELLED', makeCtx()).events[0]?.kind).toBe(
      'ShipmentCancelled',
    );
  });

  it('stamps events with the version the change will be saved under', () => {
    const { events } = confirm(shipmentIn('CREATED'), makeCtx());
    expect(events[0]?.aggregateVersion).toBe(4);
  });
});

// ─── Guards ──────────────────────────────────────────────────────────────────

describe('dispatch', () => {
  it('needs a stop, then succeeds once one is added', () => {
    const ctx = makeCtx();
    const created = createShipment('shp-1', makeInput(), ctx).shipment;
    const confirmed = confirm(created, ctx).shipment;

    expect(() => dispatch(confirmed, ctx)).toThrow(PreconditionFailedError);

    const withStop = addStop(
      confirmed,
      { sequenceNumber: 1, type: 'DELIVERY', location: { line1: 'a', city: 'b', country: 'US' } },
      ctx,
    ).shipment;
    const { shipment, events } = dispatch(withStop, ctx);

    expect(shipment.status).toBe('DISPATCHED');
    expect(shipment.actualPickupTime).toEqual(ctx.at);
    expect(events).toHaveLength(1);
    expect(events[0]?.kind).toBe('ShipmentDispatched');
  });
});

describe('deliver', () => {
  it('fails when delivery precedes pickup', () => {
    const s = shipmentIn('IN_TRANSIT');
    expect(() => deliver(s, new Date('2025-01-01T07:59:59.000Z'), makeCtx())).toThrow(
      InvalidArgumentError,
    );
  });

  it('accepts delivery exactly at pickup time and records it', () => {
    const s = shipmentIn('IN_TRANSIT');
    const at = new Date('2025-01-01T08:00:00.000Z');
    const { shipment } = deliver(s, at, makeCtx());
    expect(shipment.status).toBe('DELIVERED');
    expect(shipment.actualDeliveryTime).toEqual(at);
  });
});

// ─── Stops ───────────────────────────────────────────────────────────────────

describe('stops', () => {
  const location = { line1: 'a', city: 'b', country: 'US' };

  it('rejects a duplicate sequence number', () => {
    expect(() =>
      addStop(shipmentIn('CONFIRMED'), { sequenceNumber: 1, type: 'WAYPOINT', location }, makeCtx()),
    ).toThrow(InvalidArgumentError);
  });

  it('rejects changes on a terminal shipment', () => {
    expect(() =>
      addStop(shipmentIn('DELIVERED'), { sequenceNumber: 2, type: 'WAYPOINT', location }, makeCtx()),
    ).toThrow(InvalidStateError);
  });

  it('keeps stops ordered by sequence', () => {
    const s = addStop(
      shipmentIn('CONFIRMED'),
      { sequenceNumber: 3, type: 'WAYPOINT', location },
      makeCtx(),
    ).shipment;
    const s2 = addStop(s, { sequenceNumber: 2, type: 'FUEL', location }, makeCtx()).shipment;
    expect(s2.stops.map((x) => x.sequenceNumber)).toEqual([1, 2, 3]);
  });

  it('refuses to remove the last stop of a dispatched shipment', () => {
    const s = shipmentIn('DISPATCHED');
    const stopId = s.stops[0]?.id ?? '';
    expect(() => removeStop(s, stopId, makeCtx())).toThrow(PreconditionFailedError);
  });

  it('reports unknown stops as NotFound', () => {
    expect(() => removeStop(shipmentIn('CONFIRMED'), 'nope', makeCtx())).toThrow(NotFoundError);
  });

  it('emits StopArrived on arrival and sets the arrival time', () => {
    const s = shipmentIn('IN_TRANSIT');
    const stopId = s.stops[0]?.id ?? '';
    const ctx = makeCtx();
    const { shipment, events } = updateStopStatus(s, stopId, 'ARRIVED', ctx, 'fence-1');
    expect(shipment.stops[0]?.status).toBe('ARRIVED');
    expect(shipment.stops[0]?.actualArrival).toEqual(ctx.at);
    expect(events[0]?.kind).toBe('StopArrived');
  });

  it('follows the stop lifecycle table', () => {
    const s = shipmentIn('IN_TRANSIT');
    const stopId = s.stops[0]?.id ?? '';
    expect(() => updateStopStatus(s, stopId, 'COMPLETED', makeCtx())).toThrow(
      InvalidTransitionError,
    );
  });
});

// ─── ETA & cancellation marker ───────────────────────────────────────────────

describe('updateEstimatedDelivery', () => {
  it('rejects an ETA in the past', () => {
    expect(() =>
      updateEstimatedDelivery(shipmentIn('IN_TRANSIT'), new Date('2025-01-01T00:00:00.000Z'), makeCtx()),
    ).toThrow(InvalidArgumentError);
  });

  it('carries the previous estimate on the event', () => {
    const first = updateEstimatedDelivery(
      shipmentIn('IN_TRANSIT'),
      new Date('2025-01-03T00:00:00.000Z'),
      makeCtx(),
    ).shipment;
    const { events } = updateEstimatedDelivery(first, new Date('2025-01-04T00:00:00.000Z'), makeCtx());
    const event = events[0];
    expect(event?.kind).toBe('ShipmentEtaUpdated');
    if (event?.kind === 'ShipmentEtaUpdated') {
      expect(event.payload.previousEta).toEqual(new Date('2025-01-03T00:00:00.000Z'));
    }
  });
});

describe('cancellation marker', () => {
  it('blocks other transitions while pending', () => {
    const marked = beginCancellation(shipmentIn('IN_TRANSIT'), 'saga-1', 'customer request', makeCtx());
    expect(marked.status).toBe('IN_TRANSIT');
    expect(() => transition(marked, 'DELIVERED', makeCtx())).toThrow(InvalidStateError);
    expect(() => cancel(marked, 'other', makeCtx(), 'saga-2')).toThrow(InvalidStateError);
  });

  it('lets the owning saga finalise and clears the marker', () => {
    const marked = beginCancellation(shipmentIn('IN_TRANSIT'), 'saga-1', 'customer request', makeCtx());
    const { shipment, events } = cancel(marked, 'customer request', makeCtx(), 'saga-1');
    expect(shipment.status).toBe('CANCELLED');
    expect(shipment.pendingCancellation).toBeUndefined();
    expect(events[0]?.kind).toBe('ShipmentCancelled');
  });

  it('rejects a second cancellation while one is running', () => {
    const marked = beginCancellation(shipmentIn('CREATED'), 'saga-1', 'r', makeCtx());
    expect(() => beginCancellation(marked, 'saga-2', 'r', makeCtx())).toThrow(InvalidStateError);
  });

  it('abort restores the shipment to its prior, unmarked state', () => {
    const marked = beginCancellation(shipmentIn('DISPATCHED'), 'saga-1', 'r', makeCtx());
    const reverted = abortCancellation(marked, 'saga-1', makeCtx());
    expect(reverted.status).toBe('DISPATCHED');
    expect(reverted.pendingCancellation).toBeUndefined();
    expect(abortCancellation(reverted, 'saga-1', makeCtx())).toBe(reverted);
  });
});
