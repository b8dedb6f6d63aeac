import type { Address, GeoPoint } from '../../entities/shipment.js';
import type { Location, LocationReport } from '../../entities/location.js';
import type { LocationHistoryBucket } from '../../entities/location-history.js';
import type { DomainErrorCode } from '../../errors.js';

export interface BatchIngestResult {
  accepted: number;
  rejected: number;
  errors: Array<{ index: number; code: DomainErrorCode; reason: string }>;
}

export interface ArchiveResult {
  compactedBuckets: number;
  deletedLocations: number;
}

export interface LocationIngestionPort {
  update(report: LocationReport): Promise<Location>;
  /** Applies reports in order; stale or invalid ones are counted, not thrown. */
  ingestBatch(reports: LocationReport[]): Promise<BatchIngestResult>;
}

export interface LocationQueryPort {
  getLatest(shipmentId: string): Promise<Location>;
  getHistory(shipmentId: string, from: Date, to: Date): Promise<Location[]>;
  getDailyHistory(shipmentId: string, date: string): Promise<LocationHistoryBucket>;
  getHistoryRange(shipmentId: string, fromDate: string, toDate: string): Promise<LocationHistoryBucket[]>;
  findNearby(point: GeoPoint, radiusKm: number, since?: Date): Promise<Location[]>;
  getMoving(sinceMinutes: number): Promise<Location[]>;
  enrichWithAddress(locationId: string): Promise<Address | null>;
}

export interface LocationMaintenancePort {
  deleteHistory(shipmentId: string): Promise<{ locations: number; buckets: number }>;
  archive(daysToKeep: number): Promise<ArchiveResult>;
}
