import { describe, it, expect } from '@jest/globals';
import {
  DuplicateResourceError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
} from '@cargotrace/domain';
import { harness } from './harness.js';

const depot = {
  name: 'Depot A',
  ownerId: 'owner-1',
  shape: { kind: 'circle' as const, center: { lat: 51.5, lng: -0.12 }, radiusMeters: 500 },
};

describe('GeofenceService', () => {
  it('creates a fence with the default notification policy', async () => {
    const { app } = harness();
    const fence = await app.geofences.create(depot);

    expect(fence).toMatchObject({
      name: 'Depot A',
      active: true,
      priority: 0,
      version: 1,
      notification: { notifyOnEntry: true, notifyOnExit: true, notifyOnDwell: false, dwellThresholdMinutes: 30 },
    });
  });

  it('keeps names unique per owner only', async () => {
    const { app } = harness();
    await app.geofences.create(depot);

    await expect(app.geofences.create(depot)).rejects.toBeInstanceOf(DuplicateResourceError);
    await expect(app.geofences.create({ ...depot, ownerId: 'owner-2' })).resolves.toMatchObject({
      ownerId: 'owner-2',
    });
  });

  it('rejects invalid shapes', async () => {
    const { app } = harness();
    await expect(
      app.geofences.create({ ...depot, shape: { ...depot.shape, radiusMeters: 60_000 } }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(
      app.geofences.create({
        ...depot,
        shape: { kind: 'polygon', vertices: [{ lat: 0, lng: 0 }, { lat: 0, lng: 1 }] },
      }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('toggles activation and refuses a no-op toggle', async () => {
    const { app } = harness();
    const fence = await app.geofences.create(depot);

    await expect(app.geofences.activate(fence.id)).rejects.toBeInstanceOf(InvalidStateError);
    const inactive = await app.geofences.deactivate(fence.id);
    expect(inactive.active).toBe(false);
    expect(inactive.version).toBe(2);
    expect(await app.geofences.listActive()).toEqual([]);
  });

  it('resizes circles only', async () => {
    const { app } = harness();
    const circle = await app.geofences.create(depot);
    const square = await app.geofences.create({
      name: 'Yard',
      ownerId: 'owner-1',
      shape: {
        kind: 'polygon',
        vertices: [
          { lat: 0, lng: 0 },
          { lat: 0, lng: 0.01 },
          { lat: 0.01, lng: 0.01 },
          { lat: 0.01, lng: 0 },
        ],
      },
    });

    const resized = await app.geofences.updateRadius(circle.id, 750);
    expect(resized.shape).toEqual({ kind: 'circle', center: { lat: 51.5, lng: -0.12 }, radiusMeters: 750 });
    await expect(app.geofences.updateRadius(square.id, 750)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('reports a missing fence', async () => {
    const { app } = harness();
    await expect(app.geofences.get('nope')).rejects.toBeInstanceOf(NotFoundError);
  });
});
