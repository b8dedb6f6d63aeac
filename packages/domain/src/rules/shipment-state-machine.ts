import type {
  Address,
  Shipment,
  ShipmentEvent,
  ShipmentMode,
  ShipmentStatus,
  Stop,
  StopStatus,
  StopType,
} from '../entities/shipment.js';
import { isTerminalStatus } from '../entities/shipment.js';
import type {
  DomainEvent,
  DomainEventKind,
  DomainEventOf,
  DomainEventPayloads,
} from '../entities/domain-event.js';
import { assertNever } from '../entities/domain-event.js';
import {
  InvalidArgumentError,
  InvalidStateError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionFailedError,
} from '../errors.js';

// ─── Context & results ───────────────────────────────────────────────────────

/** Who acts, when, and where new ids come from. Keeps every rule deterministic. */
export interface RuleContext {
  readonly actor: string;
  readonly at: Date;
  readonly nextId: () => string;
}

export interface TransitionResult {
  readonly shipment: Shipment;
  readonly events: readonly DomainEvent[];
}

export interface NewStopInput {
  sequenceNumber: number;
  type: StopType;
  location: Address;
  geofenceId?: string;
  plannedArrival?: Date;
  plannedDeparture?: Date;
  referenceNumber?: string;
  contactName?: string;
  notes?: string;
}

export interface NewShipmentInput {
  shipmentNumber: string;
  customerId: string;
  carrierId: string;
  mode: ShipmentMode;
  origin: Address;
  destination: Address;
  plannedPickupTime: Date;
  plannedDeliveryTime: Date;
  stops?: NewStopInput[];
  tags?: string[];
}

export interface TransitionOptions {
  reason?: string;
  deliveryTime?: Date;
  /** Lets the owning cancellation saga finalise past its own pending marker. */
  sagaId?: string;
}

// ─── Transition tables ───────────────────────────────────────────────────────

export function allowedTargets(status: ShipmentStatus): readonly ShipmentStatus[] {
  switch (status) {
    case 'CREATED':
      return ['CONFIRMED', 'CANCELLED'];
    case 'CONFIRMED':
      return ['DISPATCHED', 'CANCELLED'];
    case 'DISPATCHED':
      return ['IN_TRANSIT', 'CANCELLED'];
    case 'IN_TRANSIT':
      return ['DELIVERED', 'CANCELLED', 'EXCEPTION'];
    case 'EXCEPTION':
      return ['IN_TRANSIT', 'CANCELLED'];
    case 'DELIVERED':
    case 'CANCELLED':
      return [];
    default:
      return assertNever(status);
  }
}

export function canTransition(from: ShipmentStatus, to: ShipmentStatus): boolean {
  return allowedTargets(from).includes(to);
}

export function allowedStopTargets(status: StopStatus): readonly StopStatus[] {
  switch (status) {
    case 'PENDING':
      return ['APPROACHING', 'ARRIVED', 'SKIPPED', 'FAILED'];
    case 'APPROACHING':
      return ['ARRIVED', 'SKIPPED', 'FAILED'];
    case 'ARRIVED':
      return ['IN_PROGRESS', 'COMPLETED', 'FAILED'];
    case 'IN_PROGRESS':
      return ['COMPLETED', 'FAILED'];
    case 'COMPLETED':
    case 'SKIPPED':
    case 'FAILED':
      return [];
    default:
      return assertNever(status);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function domainEvent<K extends DomainEventKind>(
  kind: K,
  shipment: Shipment,
  payload: DomainEventPayloads[K],
  ctx: RuleContext,
): DomainEventOf<K> {
  return {
    eventId: ctx.nextId(),
    kind,
    occurredAt: ctx.at,
    aggregateId: shipment.id,
    // the version this change will be persisted under
    aggregateVersion: shipment.version + 1,
    payload,
  };
}

function auditEntry(type: string, description: string, ctx: RuleContext): ShipmentEvent {
  return { id: ctx.nextId(), type, occurredAt: ctx.at, description, actor: ctx.actor };
}

function withAudit(shipment: Shipment, entry: ShipmentEvent, patch: Partial<Shipment>): Shipment {
  return {
    ...shipment,
    ...patch,
    events: [...shipment.events, entry],
    updatedAt: entry.occurredAt,
  };
}

function assertMutable(shipment: Shipment): void {
  if (isTerminalStatus(shipment.status)) {
    throw new InvalidStateError(
      `Shipment ${shipment.shipmentNumber} is ${shipment.status} and can no longer change`,
    );
  }
}

function sameAddress(a: Address, b: Address): boolean {
  const norm = (s: string | undefined) => (s ?? '').trim().toLowerCase();
  if (a.lat !== undefined && a.lng !== undefined && b.lat !== undefined && b.lng !== undefined) {
    return a.lat === b.lat && a.lng === b.lng;
  }
  return (
    norm(a.line1) === norm(b.line1) &&
    norm(a.city) === norm(b.city) &&
    norm(a.postalCode) === norm(b.postalCode) &&
    norm(a.country) === norm(b.country)
  );
}

function buildStop(input: NewStopInput, ctx: RuleContext): Stop {
  if (!Number.isInteger(input.sequenceNumber) || input.sequenceNumber < 1) {
    throw new InvalidArgumentError(
      `Stop sequence number must be a positive integer, got ${input.sequenceNumber}`,
    );
  }
  if (
    input.plannedArrival &&
    input.plannedDeparture &&
    input.plannedDeparture.getTime() < input.plannedArrival.getTime()
  ) {
    throw new InvalidArgumentError(
      `Stop ${input.sequenceNumber} planned departure precedes planned arrival`,
    );
  }
  return {
    id: ctx.nextId(),
    sequenceNumber: input.sequenceNumber,
    type: input.type,
    location: input.location,
    geofenceId: input.geofenceId,
    plannedArrival: input.plannedArrival,
    plannedDeparture: input.plannedDeparture,
    referenceNumber: input.referenceNumber,
    contactName: input.contactName,
    notes: input.notes,
    status: 'PENDING',
  };
}

const bySequence = (a: Stop, b: Stop): number => a.sequenceNumber - b.sequenceNumber;

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createShipment(
  id: string,
  input: NewShipmentInput,
  ctx: RuleContext,
): TransitionResult {
  const shipmentNumber = input.shipmentNumber.trim();
  if (!shipmentNumber) throw new InvalidArgumentError('Shipment number is required');
  if (!input.customerId.trim()) throw new InvalidArgumentError('Customer id is required');
  if (!input.carrierId.trim()) throw new InvalidArgumentError('Carrier id is required');
  if (input.plannedDeliveryTime.getTime() <= input.plannedPickupTime.getTime()) {
    throw new InvalidArgumentError('Planned delivery time must be after planned pickup time');
  }
  if (sameAddress(input.origin, input.destination)) {
    throw new InvalidArgumentError('Origin and destination must differ');
  }

  const stops = (input.stops ?? []).map((s) => buildStop(s, ctx));
  const sequences = new Set(stops.map((s) => s.sequenceNumber));
  if (sequences.size !== stops.length) {
    throw new InvalidArgumentError('Stop sequence numbers must be unique');
  }

  const draft: Shipment = {
    id,
    shipmentNumber,
    customerId: input.customerId,
    carrierId: input.carrierId,
    status: 'CREATED',
    mode: input.mode,
    origin: input.origin,
    destination: input.destination,
    plannedPickupTime: input.plannedPickupTime,
    plannedDeliveryTime: input.plannedDeliveryTime,
    stops: [...stops].sort(bySequence),
    events: [auditEntry('CREATED', `Shipment ${shipmentNumber} created`, ctx)],
    tags: input.tags ?? [],
    createdAt: ctx.at,
    updatedAt: ctx.at,
    version: 0,
  };

  return {
    shipment: draft,
    events: [
      domainEvent(
        'ShipmentCreated',
        draft,
        {
          shipmentNumber,
          customerId: draft.customerId,
          carrierId: draft.carrierId,
          mode: draft.mode,
          origin: draft.origin,
          destination: draft.destination,
          plannedPickupTime: draft.plannedPickupTime,
          plannedDeliveryTime: draft.plannedDeliveryTime,
        },
        ctx,
      ),
    ],
  };
}

// ─── Status transitions ──────────────────────────────────────────────────────

export function transition(
  shipment: Shipment,
  target: ShipmentStatus,
  ctx: RuleContext,
  options: TransitionOptions = {},
): TransitionResult {
  assertMutable(shipment);
  const from = shipment.status;
  if (!canTransition(from, target)) throw new InvalidTransitionError(from, target);
  const pending = shipment.pendingCancellation;
  if (pending && !(target === 'CANCELLED' && options.sagaId === pending.sagaId)) {
    throw new InvalidStateError(
      `Shipment ${shipment.shipmentNumber} has a cancellation in progress (saga ${pending.sagaId})`,
    );
  }

  switch (target) {
    case 'DISPATCHED': {
      if (shipment.stops.length === 0) {
        throw new PreconditionFailedError(
          `Shipment ${shipment.shipmentNumber} needs at least one stop before dispatch`,
        );
      }
      const next = withAudit(
        shipment,
        auditEntry('DISPATCHED', `Dispatched with ${shipment.stops.length} stop(s)`, ctx),
        { status: target, actualPickupTime: ctx.at },
      );
      return {
        shipment: next,
        events: [
          domainEvent(
            'ShipmentDispatched',
            shipment,
            { from, dispatchedAt: ctx.at, stopCount: shipment.stops.length, actor: ctx.actor },
            ctx,
          ),
        ],
      };
    }
    case 'DELIVERED': {
      const deliveredAt = options.deliveryTime ?? ctx.at;
      if (
        shipment.actualPickupTime &&
        deliveredAt.getTime() < shipment.actualPickupTime.getTime()
      ) {
        throw new InvalidArgumentError(
          `Delivery time ${deliveredAt.toISOString()} precedes pickup time ${shipment.actualPickupTime.toISOString()}`,
        );
      }
      const next = withAudit(
        shipment,
        auditEntry('DELIVERED', `Delivered at ${deliveredAt.toISOString()}`, ctx),
        { status: target, actualDeliveryTime: deliveredAt },
      );
      return {
        shipment: next,
        events: [
          domainEvent('ShipmentDelivered', shipment, { from, deliveredAt, actor: ctx.actor }, ctx),
        ],
      };
    }
    case 'CANCELLED': {
      const reason = options.reason ?? pending?.reason ?? 'unspecified';
      const next = withAudit(shipment, auditEntry('CANCELLED', `Cancelled: ${reason}`, ctx), {
        status: target,
        pendingCancellation: undefined,
      });
      return {
        shipment: next,
        events: [domainEvent('ShipmentCancelled', shipment, { from, reason, actor: ctx.actor }, ctx)],
      };
    }
    case 'CREATED':
    case 'CONFIRMED':
    case 'IN_TRANSIT':
    case 'EXCEPTION': {
      const description = options.reason
        ? `Status ${from} -> ${target}: ${options.reason}`
        : `Status ${from} -> ${target}`;
      const next = withAudit(shipment, auditEntry(target, description, ctx), { status: target });
      return {
        shipment: next,
        events: [
          domainEvent(
            'ShipmentStatusChanged',
            shipment,
            { from, to: target, reason: options.reason, actor: ctx.actor },
            ctx,
          ),
        ],
      };
    }
    default:
      return assertNever(target);
  }
}

export const confirm = (s: Shipment, ctx: RuleContext): TransitionResult =>
  transition(s, 'CONFIRMED', ctx);

export const dispatch = (s: Shipment, ctx: RuleContext): TransitionResult =>
  transition(s, 'DISPATCHED', ctx);

export const startTransit = (s: Shipment, ctx: RuleContext): TransitionResult =>
  transition(s, 'IN_TRANSIT', ctx);

export const raiseException = (s: Shipment, reason: string, ctx: RuleContext): TransitionResult =>
  transition(s, 'EXCEPTION', ctx, { reason });

export const resolveException = (s: Shipment, ctx: RuleContext): TransitionResult =>
  transition(s, 'IN_TRANSIT', ctx, { reason: 'exception resolved' });

export const deliver = (s: Shipment, deliveryTime: Date, ctx: RuleContext): TransitionResult =>
  transition(s, 'DELIVERED', ctx, { deliveryTime });

export const cancel = (
  s: Shipment,
  reason: string,
  ctx: RuleContext,
  sagaId?: string,
): TransitionResult => transition(s, 'CANCELLED', ctx, { reason, sagaId });

// ─── Stops ───────────────────────────────────────────────────────────────────

export function addStop(shipment: Shipment, input: NewStopInput, ctx: RuleContext): TransitionResult {
  assertMutable(shipment);
  if (shipment.stops.some((s) => s.sequenceNumber === input.sequenceNumber)) {
    throw new InvalidArgumentError(
      `Shipment ${shipment.shipmentNumber} already has a stop with sequence ${input.sequenceNumber}`,
    );
  }
  const stop = buildStop(input, ctx);
  const next = withAudit(
    shipment,
    auditEntry('STOP_ADDED', `Stop ${stop.sequenceNumber} (${stop.type}) added`, ctx),
    { stops: [...shipment.stops, stop].sort(bySequence) },
  );
  return {
    shipment: next,
    events: [
      domainEvent(
        'StopAdded',
        shipment,
        { stopId: stop.id, sequenceNumber: stop.sequenceNumber, type: stop.type },
        ctx,
      ),
    ],
  };
}

export function removeStop(shipment: Shipment, stopId: string, ctx: RuleContext): TransitionResult {
  assertMutable(shipment);
  const stop = shipment.stops.find((s) => s.id === stopId);
  if (!stop) throw new NotFoundError('Stop', stopId);
  if (stop.status !== 'PENDING') {
    throw new InvalidStateError(`Stop ${stop.sequenceNumber} is ${stop.status} and cannot be removed`);
  }
  if (shipment.status !== 'CREATED' && shipment.status !== 'CONFIRMED' && shipment.stops.length === 1) {
    throw new PreconditionFailedError(
      `Shipment ${shipment.shipmentNumber} is ${shipment.status} and must keep at least one stop`,
    );
  }
  const next = withAudit(
    shipment,
    auditEntry('STOP_REMOVED', `Stop ${stop.sequenceNumber} removed`, ctx),
    { stops: shipment.stops.filter((s) => s.id !== stopId) },
  );
  return {
    shipment: next,
    events: [
      domainEvent('StopRemoved', shipment, { stopId, sequenceNumber: stop.sequenceNumber }, ctx),
    ],
  };
}

export function updateStopStatus(
  shipment: Shipment,
  stopId: string,
  target: StopStatus,
  ctx: RuleContext,
  geofenceId?: string,
): TransitionResult {
  assertMutable(shipment);
  const stop = shipment.stops.find((s) => s.id === stopId);
  if (!stop) throw new NotFoundError('Stop', stopId);
  if (!allowedStopTargets(stop.status).includes(target)) {
    throw new InvalidTransitionError(`stop ${stop.status}`, target);
  }

  const updated: Stop = {
    ...stop,
    status: target,
    actualArrival:
      target === 'ARRIVED' || target === 'IN_PROGRESS' || target === 'COMPLETED'
        ? stop.actualArrival ?? ctx.at
        : stop.actualArrival,
    actualDeparture: target === 'COMPLETED' ? ctx.at : stop.actualDeparture,
  };
  const next = withAudit(
    shipment,
    auditEntry(`STOP_${target}`, `Stop ${stop.sequenceNumber}: ${stop.status} -> ${target}`, ctx),
    { stops: shipment.stops.map((s) => (s.id === stopId ? updated : s)) },
  );

  const event: DomainEvent =
    target === 'ARRIVED'
      ? domainEvent(
          'StopArrived',
          shipment,
          { stopId, sequenceNumber: stop.sequenceNumber, arrivedAt: ctx.at, geofenceId },
          ctx,
        )
      : domainEvent(
          'StopStatusChanged',
          shipment,
          { stopId, sequenceNumber: stop.sequenceNumber, from: stop.status, to: target },
          ctx,
        );
  return { shipment: next, events: [event] };
}

// ─── ETA ─────────────────────────────────────────────────────────────────────

export function updateEstimatedDelivery(
  shipment: Shipment,
  eta: Date,
  ctx: RuleContext,
): TransitionResult {
  assertMutable(shipment);
  if (eta.getTime() < ctx.at.getTime()) {
    throw new InvalidArgumentError(`Estimated delivery ${eta.toISOString()} is in the past`);
  }
  const next = withAudit(
    shipment,
    auditEntry('ETA_UPDATED', `Estimated delivery ${eta.toISOString()}`, ctx),
    { estimatedDeliveryTime: eta },
  );
  return {
    shipment: next,
    events: [
      domainEvent(
        'ShipmentEtaUpdated',
        shipment,
        { previousEta: shipment.estimatedDeliveryTime, estimatedDeliveryTime: eta },
        ctx,
      ),
    ],
  };
}

// ─── Cancellation marker ─────────────────────────────────────────────────────

export function beginCancellation(
  shipment: Shipment,
  sagaId: string,
  reason: string,
  ctx: RuleContext,
): Shipment {
  assertMutable(shipment);
  if (shipment.pendingCancellation) {
    throw new InvalidStateError(
      `Shipment ${shipment.shipmentNumber} is already being cancelled by saga ${shipment.pendingCancellation.sagaId}`,
    );
  }
  if (!canTransition(shipment.status, 'CANCELLED')) {
    throw new InvalidTransitionError(shipment.status, 'CANCELLED');
  }
  return withAudit(shipment, auditEntry('CANCELLATION_REQUESTED', `Cancelling: ${reason}`, ctx), {
    pendingCancellation: { sagaId, requestedAt: ctx.at, reason },
  });
}

/** No-op unless the marker belongs to `sagaId`. */
export function abortCancellation(shipment: Shipment, sagaId: string, ctx: RuleContext): Shipment {
  if (shipment.pendingCancellation?.sagaId !== sagaId) return shipment;
  return withAudit(
    shipment,
    auditEntry('CANCELLATION_REVERTED', `Cancellation reverted; status stays ${shipment.status}`, ctx),
    { pendingCancellation: undefined },
  );
}
