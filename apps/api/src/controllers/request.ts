import type { Request } from 'express';
import { z } from 'zod';
import { InvalidArgumentError } from '@cargotrace/domain';
import type { ShipmentMode, ShipmentStatus, StopStatus, StopType } from '@cargotrace/domain';

export function param(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) throw new InvalidArgumentError(`Missing path parameter: ${name}`);
  return value;
}

// ─── Shared schemas ───────────────────────────────────────────────────────────

const SHIPMENT_MODES = [
  'TRUCK_FTL',
  'TRUCK_LTL',
  'RAIL',
  'OCEAN',
  'AIR',
  'PARCEL',
  'INTERMODAL',
  'DRAYAGE',
  'COURIER',
] as const satisfies readonly ShipmentMode[];

const SHIPMENT_STATUSES = [
  'CREATED',
  'CONFIRMED',
  'DISPATCHED',
  'IN_TRANSIT',
  'EXCEPTION',
  'DELIVERED',
  'CANCELLED',
] as const satisfies readonly ShipmentStatus[];

const STOP_TYPES = [
  'PICKUP',
  'DELIVERY',
  'CROSS_DOCK',
  'WAYPOINT',
  'CUSTOMS',
  'INSPECTION',
  'FUEL',
  'REST',
] as const satisfies readonly StopType[];

const STOP_STATUSES = [
  'PENDING',
  'APPROACHING',
  'ARRIVED',
  'IN_PROGRESS',
  'COMPLETED',
  'SKIPPED',
  'FAILED',
] as const satisfies readonly StopStatus[];

export const latitude = z.number().min(-90).max(90);
export const longitude = z.number().min(-180).max(180);

export const addressSchema = z.object({
  line1: z.string().min(1),
  line2: z.string().optional(),
  city: z.string().min(1),
  state: z.string().optional(),
  postalCode: z.string().optional(),
  country: z.string().min(2),
  lat: latitude.optional(),
  lng: longitude.optional(),
});

export const stopSchema = z.object({
  sequenceNumber: z.number().int().positive(),
  type: z.enum(STOP_TYPES),
  location: addressSchema,
  geofenceId: z.string().min(1).optional(),
  plannedArrival: z.coerce.date().optional(),
  plannedDeparture: z.coerce.date().optional(),
  referenceNumber: z.string().optional(),
  contactName: z.string().optional(),
  notes: z.string().optional(),
});

export const createShipmentSchema = z.object({
  shipmentNumber: z.string().min(1),
  customerId: z.string().min(1),
  carrierId: z.string().min(1),
  mode: z.enum(SHIPMENT_MODES),
  origin: addressSchema,
  destination: addressSchema,
  plannedPickupTime: z.coerce.date(),
  plannedDeliveryTime: z.coerce.date(),
  stops: z.array(stopSchema).optional(),
  tags: z.array(z.string()).optional(),
});

export const shipmentStatusSchema = z.enum(SHIPMENT_STATUSES);
export const stopStatusSchema = z.enum(STOP_STATUSES);

export const paginationSchema = {
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
};
