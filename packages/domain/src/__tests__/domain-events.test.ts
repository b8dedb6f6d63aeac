import { describe, it, expect } from '@jest/globals';

import {
  DOMAIN_EVENT_KINDS,
  ConcurrentModificationError,
  InvalidLocationDataError,
  NotFoundError,
  SagaFailedError,
  StaleUpdateError,
  isDomainError,
  topicFor,
} from '../index.js';

describe('topicFor', () => {
  it('routes every event kind to a topic', () => {
    for (const kind of DOMAIN_EVENT_KINDS) {
      expect(topicFor(kind)).toMatch(/^(shipment|location)\./);
    }
  });

  it('routes the geofence kinds to the geofence topic', () => {
    expect(topicFor('GeofenceEntered')).toBe('location.geofence.events');
    expect(topicFor('GeofenceExited')).toBe('location.geofence.events');
    expect(topicFor('GeofenceDwelled')).toBe('location.geofence.events');
  });

  it('routes lifecycle kinds to their own topics', () => {
    expect(topicFor('ShipmentCreated')).toBe('shipment.created');
    expect(topicFor('ShipmentDispatched')).toBe('shipment.status-changed');
    expect(topicFor('ShipmentCancelled')).toBe('shipment.cancelled');
    expect(topicFor('ShipmentDelivered')).toBe('shipment.delivered');
    expect(topicFor('StopArrived')).toBe('shipment.updated');
    expect(topicFor('LocationUpdated')).toBe('location.updates');
  });
});

describe('DomainError', () => {
  it('carries code, status and class name', () => {
    const err = new NotFoundError('Shipment', 'shp-1');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.status).toBe(404);
    expect(err.name).toBe('NotFoundError');
    expect(err.message).toBe('Shipment not found: shp-1');
    expect(isDomainError(err)).toBe(true);
    expect(isDomainError(new Error('x'))).toBe(false);
  });

  it('marks only concurrent modification as retryable', () => {
    expect(new ConcurrentModificationError('Shipment', 'shp-1').retryable).toBe(true);
    expect(
      new StaleUpdateError('shp-1', new Date(0), new Date(1000)).retryable,
    ).toBe(false);
  });

  it('keeps the location-data code on the argument subclass', () => {
    const err = new InvalidLocationDataError('latitude out of range');
    expect(err.code).toBe('INVALID_LOCATION_DATA');
    expect(err.status).toBe(400);
  });

  it('attaches the original cause to a saga failure', () => {
    const cause = new Error('gateway down');
    const err = new SagaFailedError('saga-1', 'ProcessRefund', cause);
    expect(err.cause).toBe(cause);
    expect(err.failedStep).toBe('ProcessRefund');
    expect(err.message).toBe('Saga saga-1 failed at step ProcessRefund: gateway down');
  });
});
