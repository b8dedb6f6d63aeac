import { v4 as uuidv4 } from 'uuid';
import type {
  Address,
  ArchiveResult,
  BatchIngestResult,
  DomainEvent,
  GeoPoint,
  GeocodingPort,
  GeofenceCrossing,
  GeofenceRepositoryPort,
  HistoryPoint,
  LatestLocation,
  Location,
  LocationHistoryBucket,
  LocationHistoryRepositoryPort,
  LocationIngestionPort,
  LocationMaintenancePort,
  LocationQuality,
  LocationQueryPort,
  LocationReport,
  LocationRepositoryPort,
  Shipment,
  ShipmentRepositoryPort,
  ShipmentStatus,
} from '@cargotrace/domain';
import {
  ARCHIVE_POINTS_PER_DAY,
  ConcurrentModificationError,
  DEFAULT_MAX_POINTS_PER_DAY,
  InvalidArgumentError,
  InvalidLocationDataError,
  NotFoundError,
  PreconditionFailedError,
  StaleUpdateError,
  appendPoint,
  assertNever,
  compactBucket,
  createBucket,
  dateKey,
  evaluate,
  isDomainError,
  isValidCoordinate,
  nearestOpenStop,
  routeDeviationKm,
} from '@cargotrace/domain';
import type { Clock } from '@cargotrace/adapters';
import { wallClockNow } from '@cargotrace/adapters';
import type { DomainEventPublisher } from '../choreography/event-choreographer.js';

export const HISTORY_RETRY_ATTEMPTS = 3;
export const DEFAULT_ROUTE_DEVIATION_THRESHOLD_KM = 5;

/** metres per second */
const MOVING_SPEED_THRESHOLD = 0.5;
const MAX_NEARBY_RADIUS_KM = 500;
const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;
const MONITORED: ReadonlySet<ShipmentStatus> = new Set(['DISPATCHED', 'IN_TRANSIT', 'EXCEPTION']);

// ─── Derivations ─────────────────────────────────────────────────────────────

export function deriveQuality(accuracy: number | undefined): LocationQuality {
  if (accuracy === undefined) return 'UNKNOWN';
  if (accuracy < 10) return 'HIGH';
  if (accuracy < 50) return 'STANDARD';
  return 'LOW';
}

export function deriveIsMoving(speed: number | undefined): boolean {
  return speed !== undefined && speed > MOVING_SPEED_THRESHOLD;
}

export function validateReport(report: LocationReport): void {
  if (typeof report.shipmentId !== 'string' || !report.shipmentId.trim()) {
    throw new InvalidLocationDataError('shipmentId is required');
  }
  if (typeof report.deviceId !== 'string' || !report.deviceId.trim()) {
    throw new InvalidLocationDataError('deviceId is required');
  }
  if (!isValidCoordinate(report.latitude, report.longitude)) {
    throw new InvalidLocationDataError(
      `Coordinates out of range: (${report.latitude}, ${report.longitude})`,
    );
  }
  if (!(report.timestamp instanceof Date) || Number.isNaN(report.timestamp.getTime())) {
    throw new InvalidLocationDataError('timestamp is not a valid instant');
  }
  if (report.speed !== undefined && !(report.speed >= 0)) {
    throw new InvalidLocationDataError(`speed must be non-negative, got ${report.speed}`);
  }
  if (report.accuracy !== undefined && !(report.accuracy >= 0)) {
    throw new InvalidLocationDataError(`accuracy must be non-negative, got ${report.accuracy}`);
  }
  if (report.heading !== undefined && !(report.heading >= 0 && report.heading <= 360)) {
    throw new InvalidLocationDataError(`heading must be within [0, 360], got ${report.heading}`);
  }
}

// ─── Tracker ─────────────────────────────────────────────────────────────────

export interface LocationTrackerDeps {
  locations: LocationRepositoryPort;
  history: LocationHistoryRepositoryPort;
  geofences: GeofenceRepositoryPort;
  /** Read-only; used for stop correlation and route deviation. */
  shipments: ShipmentRepositoryPort;
  events: DomainEventPublisher;
  geocoder?: GeocodingPort;
  clock?: Clock;
  newId?: () => string;
  maxPointsPerDay?: number;
  routeDeviationThresholdKm?: number;
}

export class LocationTracker
  implements LocationIngestionPort, LocationQueryPort, LocationMaintenancePort
{
  private readonly locations: LocationRepositoryPort;
  private readonly history: LocationHistoryRepositoryPort;
  private readonly geofences: GeofenceRepositoryPort;
  private readonly shipments: ShipmentRepositoryPort;
  private readonly events: DomainEventPublisher;
  private readonly geocoder?: GeocodingPort;
  private readonly clock: Clock;
  private readonly newId: () => string;
  private readonly maxPointsPerDay: number;
  private readonly deviationThresholdKm: number;

  constructor(deps: LocationTrackerDeps) {
    this.locations = deps.locations;
    this.history = deps.history;
    this.geofences = deps.geofences;
    this.shipments = deps.shipments;
    this.events = deps.events;
    this.geocoder = deps.geocoder;
    this.clock = deps.clock ?? wallClockNow;
    this.newId = deps.newId ?? uuidv4;
    this.maxPointsPerDay = deps.maxPointsPerDay ?? DEFAULT_MAX_POINTS_PER_DAY;
    this.deviationThresholdKm = deps.routeDeviationThresholdKm ?? DEFAULT_ROUTE_DEVIATION_THRESHOLD_KM;
  }

  // ─── Ingestion ──────────────────────────────────────────────────────────────

  async update(report: LocationReport): Promise<Location> {
    validateReport(report);

    const prior = await this.locations.getLatest(report.shipmentId);
    if (prior && report.timestamp.getTime() < prior.location.timestamp.getTime()) {
      console.debug(
        `[location-tracker] stale report for ${report.shipmentId}: ` +
          `${report.timestamp.toISOString()} < ${prior.location.timestamp.toISOString()}`,
      );
      throw new StaleUpdateError(report.shipmentId, report.timestamp, prior.location.timestamp);
    }

    const point: GeoPoint = { lat: report.latitude, lng: report.longitude };
    const [shipment, fences] = await Promise.all([
      this.shipments.findById(report.shipmentId),
      this.geofences.findAllActive(),
    ]);
    const evaluation = evaluate(fences, prior?.location.geofence, point, report.timestamp);

    const location: Location = {
      id: this.newId(),
      shipmentId: report.shipmentId,
      deviceId: report.deviceId,
      latitude: report.latitude,
      longitude: report.longitude,
      altitude: report.altitude,
      speed: report.speed,
      heading: report.heading,
      accuracy: report.accuracy,
      timestamp: report.timestamp,
      receivedAt: this.clock(),
      quality: deriveQuality(report.accuracy),
      isMoving: deriveIsMoving(report.speed),
      geofence: evaluation.presence,
      nearestStop: shipment ? nearestOpenStop(shipment, point) : undefined,
      metadata: report.metadata ?? {},
    };

    const latest = await this.locations.saveLatest(location, prior?.version ?? 0);
    if (!latest.ok) throw new ConcurrentModificationError('Latest location', report.shipmentId);
    await this.locations.insert(location);
    await this.appendToHistory(location);

    const events = [
      this.locationUpdated(location, latest.value),
      ...evaluation.crossings.map((c) => this.crossingEvent(location, latest.value, c)),
      ...this.deviationEvents(shipment, prior, location, latest.value),
    ];
    for (const event of events) {
      await this.events.publish(event);
    }
    return location;
  }

  async ingestBatch(reports: LocationReport[]): Promise<BatchIngestResult> {
    const result: BatchIngestResult = { accepted: 0, rejected: 0, errors: [] };
    for (const [index, report] of reports.entries()) {
      try {
        await this.update(report);
        result.accepted++;
      } catch (err) {
        if (!isDomainError(err)) throw err;
        result.rejected++;
        result.errors.push({ index, code: err.code, reason: err.message });
      }
    }
    if (result.rejected > 0) {
      console.warn(
        `[location-tracker] batch: ${result.accepted} accepted, ${result.rejected} rejected`,
      );
    }
    return result;
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  async getLatest(shipmentId: string): Promise<Location> {
    const latest = await this.locations.getLatest(shipmentId);
    if (!latest) throw new NotFoundError('Location', shipmentId);
    return latest.location;
  }

  async getHistory(shipmentId: string, from: Date, to: Date): Promise<Location[]> {
    if (from.getTime() > to.getTime()) {
      throw new InvalidArgumentError('History range start is after its end');
    }
    return this.locations.findHistory(shipmentId, from, to);
  }

  async getDailyHistory(shipmentId: string, date: string): Promise<LocationHistoryBucket> {
    assertDateKey(date);
    const bucket = await this.history.findBucket(shipmentId, date);
    if (!bucket) throw new NotFoundError('Location history', `${shipmentId}/${date}`);
    return bucket;
  }

  async getHistoryRange(
    shipmentId: string,
    fromDate: string,
    toDate: string,
  ): Promise<LocationHistoryBucket[]> {
    assertDateKey(fromDate);
    assertDateKey(toDate);
    if (fromDate > toDate) throw new InvalidArgumentError('History range start is after its end');
    return this.history.findRange(shipmentId, fromDate, toDate);
  }

  async findNearby(point: GeoPoint, radiusKm: number, since?: Date): Promise<Location[]> {
    if (!isValidCoordinate(point.lat, point.lng)) {
      throw new InvalidLocationDataError(`Coordinates out of range: (${point.lat}, ${point.lng})`);
    }
    if (!(radiusKm > 0 && radiusKm <= MAX_NEARBY_RADIUS_KM)) {
      throw new InvalidArgumentError(`radiusKm must be in (0, ${MAX_NEARBY_RADIUS_KM}]`);
    }
    return this.locations.findLatestNear(point, radiusKm, since);
  }

  async getMoving(sinceMinutes: number): Promise<Location[]> {
    if (!(sinceMinutes > 0)) throw new InvalidArgumentError('sinceMinutes must be positive');
    return this.locations.findMovingSince(new Date(this.clock().getTime() - sinceMinutes * 60_000));
  }

  /** Reverse geocodes one stored report; never part of the update path. */
  async enrichWithAddress(locationId: string): Promise<Address | null> {
    if (!this.geocoder) throw new PreconditionFailedError('Reverse geocoding is not configured');
    const location = await this.locations.findById(locationId);
    if (!location) throw new NotFoundError('Location', locationId);

    const address = await this.geocoder.reverseGeocode({
      lat: location.latitude,
      lng: location.longitude,
    });
    if (!address) return null;
    await this.locations.updateAddress(locationId, address);
    return address;
  }

  // ─── Maintenance ────────────────────────────────────────────────────────────

  async deleteHistory(shipmentId: string): Promise<{ locations: number; buckets: number }> {
    const [locations, buckets] = await Promise.all([
      this.locations.deleteByShipment(shipmentId),
      this.history.deleteByShipment(shipmentId),
    ]);
    console.log(
      `[location-tracker] deleted history of ${shipmentId}: ${locations} reports, ${buckets} buckets`,
    );
    return { locations, buckets };
  }

  /**
   * Compresses daily buckets older than `daysToKeep` to the archive density and
   * drops raw reports before the same cutoff.
   */
  async archive(daysToKeep: number): Promise<ArchiveResult> {
    if (!Number.isInteger(daysToKeep) || daysToKeep < 1) {
      throw new InvalidArgumentError('daysToKeep must be a positive integer');
    }
    const now = this.clock();
    const startOfToday = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
    const cutoff = new Date(startOfToday - daysToKeep * DAY_MS);

    let compactedBuckets = 0;
    for (const bucket of await this.history.findOlderThan(dateKey(cutoff))) {
      const compacted = compactBucket(bucket, ARCHIVE_POINTS_PER_DAY, now);
      if (compacted === bucket) continue;
      const result = await this.history.saveBucket(compacted, bucket.version);
      if (result.ok) {
        compactedBuckets++;
      } else {
        console.warn(
          `[location-tracker] archive skipped ${bucket.shipmentId}/${bucket.date}: ${result.reason}`,
        );
      }
    }
    const deletedLocations = await this.locations.deleteOlderThan(cutoff);

    console.log(
      `[location-tracker] archive before ${cutoff.toISOString()}: ` +
        `${compactedBuckets} buckets compacted, ${deletedLocations} reports deleted`,
    );
    return { compactedBuckets, deletedLocations };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async appendToHistory(location: Location): Promise<void> {
    const date = dateKey(location.timestamp);
    const point: HistoryPoint = {
      lat: location.latitude,
      lng: location.longitude,
      altitude: location.altitude,
      speed: location.speed,
      heading: location.heading,
      ts: location.timestamp,
    };

    for (let attempt = 1; attempt <= HISTORY_RETRY_ATTEMPTS; attempt++) {
      const now = this.clock();
      const bucket =
        (await this.history.findBucket(location.shipmentId, date)) ??
        createBucket(location.shipmentId, date, now);
      const result = await this.history.saveBucket(
        appendPoint(bucket, point, now, this.maxPointsPerDay),
        bucket.version,
      );
      if (result.ok) return;
      console.warn(
        `[location-tracker] history ${location.shipmentId}/${date} conflict (attempt ${attempt})`,
      );
    }
    throw new ConcurrentModificationError('Location history', `${location.shipmentId}/${date}`);
  }

  private envelope(location: Location, latest: LatestLocation) {
    return {
      eventId: this.newId(),
      occurredAt: location.timestamp,
      aggregateId: location.shipmentId,
      aggregateVersion: latest.version,
    };
  }

  private locationUpdated(location: Location, latest: LatestLocation): DomainEvent {
    return {
      ...this.envelope(location, latest),
      kind: 'LocationUpdated',
      payload: {
        locationId: location.id,
        deviceId: location.deviceId,
        latitude: location.latitude,
        longitude: location.longitude,
        speed: location.speed,
        heading: location.heading,
        isMoving: location.isMoving,
        timestamp: location.timestamp,
        nearestStopId: location.nearestStop?.stopId,
        nearestStopKm: location.nearestStop?.distanceKm,
      },
    };
  }

  private crossingEvent(
    location: Location,
    latest: LatestLocation,
    crossing: GeofenceCrossing,
  ): DomainEvent {
    const base = this.envelope(location, latest);
    const fence = { geofenceId: crossing.geofenceId, geofenceName: crossing.geofenceName };
    switch (crossing.transition) {
      case 'ENTER':
        return {
          ...base,
          kind: 'GeofenceEntered',
          payload: {
            ...fence,
            latitude: location.latitude,
            longitude: location.longitude,
            notify: crossing.notify,
          },
        };
      case 'EXIT':
        return {
          ...base,
          kind: 'GeofenceExited',
          payload: {
            ...fence,
            latitude: location.latitude,
            longitude: location.longitude,
            dwellMs: crossing.dwellMs,
            notify: crossing.notify,
          },
        };
      case 'DWELL':
        return {
          ...base,
          kind: 'GeofenceDwelled',
          payload: { ...fence, dwellMs: crossing.dwellMs, notify: crossing.notify },
        };
      default:
        return assertNever(crossing.transition);
    }
  }

  /** Fires when the shipment leaves the planned corridor, not on every report while outside it. */
  private deviationEvents(
    shipment: Shipment | null,
    prior: LatestLocation | null,
    location: Location,
    latest: LatestLocation,
  ): DomainEvent[] {
    if (!shipment || !MONITORED.has(shipment.status)) return [];
    const deviation = routeDeviationKm(shipment, { lat: location.latitude, lng: location.longitude });
    if (deviation === undefined || deviation <= this.deviationThresholdKm) return [];

    if (prior) {
      const before = routeDeviationKm(shipment, {
        lat: prior.location.latitude,
        lng: prior.location.longitude,
      });
      if (before !== undefined && before > this.deviationThresholdKm) return [];
    }

    console.warn(
      `[location-tracker] ${shipment.shipmentNumber} is ${deviation.toFixed(1)} km off its planned route`,
    );
    return [
      {
        ...this.envelope(location, latest),
        kind: 'RouteDeviationDetected',
        payload: {
          latitude: location.latitude,
          longitude: location.longitude,
          deviationKm: deviation,
          thresholdKm: this.deviationThresholdKm,
        },
      },
    ];
  }
}

function assertDateKey(date: string): void {
  if (!DATE_KEY.test(date) || Number.isNaN(Date.parse(`${date}T00:00:00Z`))) {
    throw new InvalidArgumentError(`Expected a YYYY-MM-DD date, got "${date}"`);
  }
}
