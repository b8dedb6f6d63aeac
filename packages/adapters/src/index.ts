// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export {
  getPool,
  closePool,
  withTransaction,
  applySchema,
  schemaPath,
  isUniqueViolation,
} from './postgres/pool.js';
export type { DbPool, DbClient, Queryable, TransactionRunner } from './postgres/pool.js';
export { PgShipmentRepository } from './postgres/shipment.repository.js';
export { PgLocationRepository } from './postgres/location.repository.js';
export { PgLocationHistoryRepository } from './postgres/location-history.repository.js';
export { PgGeofenceRepository } from './postgres/geofence.repository.js';
export { PgSagaRepository } from './postgres/saga.repository.js';
export { PgTrackingSessionAdapter } from './postgres/tracking-session.adapter.js';
export { PgEventStreamAdapter } from './postgres/event-stream.adapter.js';
export { PgNotificationOutbox } from './postgres/notification-outbox.adapter.js';
export { PgRefundLedger } from './postgres/refund-ledger.adapter.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { MemoryShipmentRepository } from './memory/memory-shipment.repository.js';
export { MemoryLocationRepository } from './memory/memory-location.repository.js';
export { MemoryLocationHistoryRepository } from './memory/memory-location-history.repository.js';
export { MemoryGeofenceRepository } from './memory/memory-geofence.repository.js';
export { MemorySagaRepository } from './memory/memory-saga.repository.js';
export {
  MemoryTrackingSessions,
  MemoryEventStream,
  MemoryNotifications,
  MemoryRefunds,
} from './memory/memory-collaborators.js';
export type { SentNotification, RefundEntry } from './memory/memory-collaborators.js';

// ─── Geocoding ────────────────────────────────────────────────────────────────
export { NominatimGeocoder } from './geocoding/nominatim-geocoder.adapter.js';

// ─── Clock ──────────────────────────────────────────────────────────────
export { DeterministicClock, wallClockNow } from './clock/deterministic-clock.js';
export type { Clock } from './clock/deterministic-clock.js';
