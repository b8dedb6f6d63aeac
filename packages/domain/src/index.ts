// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/shipment.js';
export * from './entities/location.js';
export * from './entities/location-history.js';
export * from './entities/geofence.js';
export * from './entities/domain-event.js';
export * from './entities/saga.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Rules ────────────────────────────────────────────────────────────────────
export * from './geo/geo-math.js';
export * from './rules/shipment-state-machine.js';
export * from './rules/geofence-engine.js';
export * from './rules/location-history.js';
export * from './rules/route-monitor.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/shipment-command.port.js';
export * from './ports/inbound/location-ingestion.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/save-result.port.js';
export * from './ports/outbound/shipment-repository.port.js';
export * from './ports/outbound/location-repository.port.js';
export * from './ports/outbound/location-history-repository.port.js';
export * from './ports/outbound/geofence-repository.port.js';
export * from './ports/outbound/saga-repository.port.js';
export * from './ports/outbound/event-transport.port.js';
export * from './ports/outbound/notification.port.js';
export * from './ports/outbound/tracking-session.port.js';
export * from './ports/outbound/event-stream.port.js';
export * from './ports/outbound/refund.port.js';
export * from './ports/outbound/geocoding.port.js';
export * from './ports/outbound/eta-estimator.port.js';
