import { describe, it, expect } from '@jest/globals';

import {
  DEFAULT_NOTIFICATION_POLICY,
  InvalidArgumentError,
  containsCircular,
  distanceKm,
  evaluate,
  orderForEvaluation,
  validateGeofence,
} from '../index.js';
import type { Geofence, GeofenceShape } from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const T0 = new Date('2025-03-01T12:00:00.000Z');
const minutes = (m: number) => new Date(T0.getTime() + m * 60_000);

function makeFence(overrides: Partial<Geofence> = {}): Geofence {
  return {
    id: 'fence-1',
    name: 'Newark yard',
    ownerId: 'owner-1',
    shape: { kind: 'circle', center: { lat: 40, lng: -74 }, radiusMeters: 500 },
    active: true,
    tags: [],
    notification: DEFAULT_NOTIFICATION_POLICY,
    priority: 0,
    createdAt: T0,
    updatedAt: T0,
    version: 1,
    ...overrides,
  };
}

// ─── Containment ──────────────────────────────────────────────────────────────

describe('containsCircular', () => {
  const center = { lat: 40, lng: -74 };
  const point = { lat: 40.003, lng: -74.002 };
  const exact = distanceKm(center, point) * 1000;

  it('treats a point exactly on the radius as inside', () => {
    expect(containsCircular({ kind: 'circle', center, radiusMeters: exact }, point)).toBe(true);
  });

  it('treats a point one metre beyond the radius as outside', () => {
    expect(containsCircular({ kind: 'circle', center, radiusMeters: exact - 1 }, point)).toBe(false);
  });
});

// ─── Validation ───────────────────────────────────────────────────────────────

describe('validateGeofence', () => {
  const base = { name: 'yard', notification: DEFAULT_NOTIFICATION_POLICY, priority: 0 };
  const circle = (radiusMeters: number): GeofenceShape => ({
    kind: 'circle',
    center: { lat: 1, lng: 1 },
    radiusMeters,
  });

  it('accepts radii up to 50 km', () => {
    expect(() => validateGeofence({ ...base, shape: circle(50_000) })).not.toThrow();
  });

  it('rejects zero and oversized radii', () => {
    expect(() => validateGeofence({ ...base, shape: circle(0) })).toThrow(InvalidArgumentError);
    expect(() => validateGeofence({ ...base, shape: circle(50_001) })).toThrow(InvalidArgumentError);
  });

  it('rejects polygons with fewer than three vertices', () => {
    expect(() =>
      validateGeofence({
        ...base,
        shape: { kind: 'polygon', vertices: [{ lat: 0, lng: 0 }, { lat: 1, lng: 1 }] },
      }),
    ).toThrow(InvalidArgumentError);
  });
});

// ─── Ordering ─────────────────────────────────────────────────────────────────

describe('orderForEvaluation', () => {
  it('prefers priority, then the smaller area, then the id', () => {
    const big = makeFence({ id: 'b', shape: { kind: 'circle', center: { lat: 40, lng: -74 }, radiusMeters: 900 } });
    const small = makeFence({ id: 'c', shape: { kind: 'circle', center: { lat: 40, lng: -74 }, radiusMeters: 100 } });
    const twin = makeFence({ id: 'a', shape: { kind: 'circle', center: { lat: 40, lng: -74 }, radiusMeters: 100 } });
    const urgent = makeFence({ id: 'z', priority: 5 });

    expect(orderForEvaluation([big, small, urgent, twin]).map((f) => f.id)).toEqual(['z', 'a', 'c', 'b']);
  });
});

// ─── Evaluation ───────────────────────────────────────────────────────────────

describe('evaluate', () => {
  it('enters, then exits with the elapsed dwell time', () => {
    const fence = makeFence();
    const first = evaluate([fence], undefined, { lat: 40, lng: -74 }, T0);

    expect(first.crossings).toEqual([
      { transition: 'ENTER', geofenceId: 'fence-1', geofenceName: 'Newark yard', dwellMs: 0, notify: true },
    ]);
    expect(first.presence?.enteredAt).toEqual(T0);

    const second = evaluate([fence], first.presence, { lat: 40.01, lng: -74 }, minutes(10));
    expect(second.crossings).toEqual([
      { transition: 'EXIT', geofenceId: 'fence-1', geofenceName: 'Newark yard', dwellMs: 600_000, notify: true },
    ]);
    expect(second.presence).toBeUndefined();
  });

  it('ignores inactive fences', () => {
    const result = evaluate([makeFence({ active: false })], undefined, { lat: 40, lng: -74 }, T0);
    expect(result.crossings).toHaveLength(0);
    expect(result.presence).toBeUndefined();
  });

  it('emits DWELL once after the threshold', () => {
    const fence = makeFence({
      notification: { ...DEFAULT_NOTIFICATION_POLICY, notifyOnDwell: true, dwellThresholdMinutes: 30 },
    });
    const here = { lat: 40, lng: -74 };
    const entered = evaluate([fence], undefined, here, T0).presence;

    expect(evaluate([fence], entered, here, minutes(29)).crossings).toHaveLength(0);

    const dwelled = evaluate([fence], entered, here, minutes(30));
    expect(dwelled.crossings.map((c) => c.transition)).toEqual(['DWELL']);
    expect(dwelled.crossings[0]?.dwellMs).toBe(30 * 60_000);
    expect(dwelled.presence?.dwellNotified).toBe(true);

    expect(evaluate([fence], dwelled.presence, here, minutes(90)).crossings).toHaveLength(0);
  });

  it('never emits DWELL when the policy does not ask for it', () => {
    const fence = makeFence();
    const here = { lat: 40, lng: -74 };
    const entered = evaluate([fence], undefined, here, T0).presence;
    expect(evaluate([fence], entered, here, minutes(600)).crossings).toHaveLength(0);
  });

  it('exits the old fence and enters the new one when moving between fences', () => {
    const yard = makeFence();
    const depot = makeFence({
      id: 'fence-2',
      name: 'Depot',
      shape: { kind: 'circle', center: { lat: 41, lng: -74 }, radiusMeters: 500 },
      notification: { ...DEFAULT_NOTIFICATION_POLICY, notifyOnEntry: false },
    });
    const entered = evaluate([yard, depot], undefined, { lat: 40, lng: -74 }, T0).presence;
    const moved = evaluate([yard, depot], entered, { lat: 41, lng: -74 }, minutes(60));

    expect(moved.crossings.map((c) => [c.transition, c.geofenceId, c.notify])).toEqual([
      ['EXIT', 'fence-1', true],
      ['ENTER', 'fence-2', false],
    ]);
    expect(moved.presence?.geofenceId).toBe('fence-2');
  });

  it('stays attached to the current fence when a higher-priority one overlaps', () => {
    const yard = makeFence();
    const gate = makeFence({ id: 'fence-9', priority: 10 });
    const entered = evaluate([yard], undefined, { lat: 40, lng: -74 }, T0).presence;
    const next = evaluate([yard, gate], entered, { lat: 40, lng: -74 }, minutes(1));
    expect(next.crossings).toHaveLength(0);
    expect(next.presence?.geofenceId).toBe('fence-1');
  });
});
