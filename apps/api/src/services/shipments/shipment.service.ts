import { v4 as uuidv4 } from 'uuid';
import type {
  DomainEvent,
  NewShipmentInput,
  NewStopInput,
  RuleContext,
  Shipment,
  ShipmentCommandPort,
  ShipmentListFilters,
  ShipmentRepositoryPort,
  StopStatus,
  TransitionResult,
} from '@cargotrace/domain';
import {
  ConcurrentModificationError,
  DuplicateResourceError,
  NotFoundError,
  abortCancellation,
  addStop,
  beginCancellation,
  cancel,
  confirm,
  createShipment,
  deliver,
  dispatch,
  raiseException,
  removeStop,
  resolveException,
  startTransit,
  updateEstimatedDelivery,
  updateStopStatus,
} from '@cargotrace/domain';
import type { Clock } from '@cargotrace/adapters';
import { wallClockNow } from '@cargotrace/adapters';
import type { DomainEventPublisher } from '../choreography/event-choreographer.js';

/** What the cancellation saga needs from the shipment context. */
export interface CancellableShipments {
  find(id: string): Promise<Shipment | null>;
  get(id: string): Promise<Shipment>;
  beginCancellation(id: string, sagaId: string, reason: string, actor: string): Promise<Shipment>;
  abortCancellation(id: string, sagaId: string, actor: string): Promise<Shipment>;
  finalizeCancellation(id: string, sagaId: string, reason: string, actor: string): Promise<Shipment>;
}

export interface ShipmentServiceDeps {
  shipments: ShipmentRepositoryPort;
  events: DomainEventPublisher;
  clock?: Clock;
  newId?: () => string;
}

/**
 * Load, apply a pure rule, save under the loaded version, then publish.
 * A version mismatch surfaces as ConcurrentModificationError; nothing here retries.
 */
export class ShipmentService implements ShipmentCommandPort, CancellableShipments {
  private readonly shipments: ShipmentRepositoryPort;
  private readonly events: DomainEventPublisher;
  private readonly clock: Clock;
  private readonly newId: () => string;

  constructor(deps: ShipmentServiceDeps) {
    this.shipments = deps.shipments;
    this.events = deps.events;
    this.clock = deps.clock ?? wallClockNow;
    this.newId = deps.newId ?? uuidv4;
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  async find(id: string): Promise<Shipment | null> {
    return this.shipments.findById(id);
  }

  async get(id: string): Promise<Shipment> {
    const shipment = await this.shipments.findById(id);
    if (!shipment) throw new NotFoundError('Shipment', id);
    return shipment;
  }

  async getByNumber(shipmentNumber: string): Promise<Shipment> {
    const shipment = await this.shipments.findByShipmentNumber(shipmentNumber);
    if (!shipment) throw new NotFoundError('Shipment', shipmentNumber);
    return shipment;
  }

  async list(filters: ShipmentListFilters = {}): Promise<Shipment[]> {
    return this.shipments.list(filters);
  }

  // ─── Commands ───────────────────────────────────────────────────────────────

  async create(input: NewShipmentInput, actor: string): Promise<Shipment> {
    const { shipment, events } = createShipment(this.newId(), input, this.ctx(actor));
    const result = await this.shipments.save(shipment, 0);
    if (!result.ok) {
      throw new DuplicateResourceError(`Shipment number ${input.shipmentNumber} already exists`);
    }
    console.log(`[shipment-service] created ${shipment.shipmentNumber} (${shipment.id})`);
    await this.publishAll(events);
    return result.value;
  }

  /** Hard delete. */
  async delete(id: string): Promise<void> {
    const removed = await this.shipments.delete(id);
    if (!removed) throw new NotFoundError('Shipment', id);
    console.log(`[shipment-service] deleted ${id}`);
  }

  confirm(id: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => confirm(s, ctx));
  }

  dispatch(id: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => dispatch(s, ctx));
  }

  startTransit(id: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => startTransit(s, ctx));
  }

  raiseException(id: string, reason: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => raiseException(s, reason, ctx));
  }

  resolveException(id: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => resolveException(s, ctx));
  }

  deliver(id: string, deliveryTime: Date, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => deliver(s, deliveryTime, ctx));
  }

  updateEstimatedDelivery(id: string, eta: Date, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => updateEstimatedDelivery(s, eta, ctx));
  }

  addStop(id: string, stop: NewStopInput, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => addStop(s, stop, ctx));
  }

  removeStop(id: string, stopId: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => removeStop(s, stopId, ctx));
  }

  updateStopStatus(
    id: string,
    stopId: string,
    status: StopStatus,
    actor: string,
    geofenceId?: string,
  ): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => updateStopStatus(s, stopId, status, ctx, geofenceId));
  }

  // ─── Cancellation (saga-driven) ─────────────────────────────────────────────

  async beginCancellation(id: string, sagaId: string, reason: string, actor: string): Promise<Shipment> {
    const current = await this.get(id);
    return this.persist(current, beginCancellation(current, sagaId, reason, this.ctx(actor)));
  }

  async abortCancellation(id: string, sagaId: string, actor: string): Promise<Shipment> {
    const current = await this.get(id);
    const next = abortCancellation(current, sagaId, this.ctx(actor));
    return next === current ? current : this.persist(current, next);
  }

  finalizeCancellation(id: string, sagaId: string, reason: string, actor: string): Promise<Shipment> {
    return this.mutate(id, actor, (s, ctx) => cancel(s, reason, ctx, sagaId));
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private ctx(actor: string): RuleContext {
    return { actor, at: this.clock(), nextId: this.newId };
  }

  private async mutate(
    id: string,
    actor: string,
    rule: (shipment: Shipment, ctx: RuleContext) => TransitionResult,
  ): Promise<Shipment> {
    const current = await this.get(id);
    const { shipment, events } = rule(current, this.ctx(actor));
    const stored = await this.persist(current, shipment);
    await this.publishAll(events);
    return stored;
  }

  private async persist(current: Shipment, next: Shipment): Promise<Shipment> {
    const result = await this.shipments.save(next, current.version);
    if (result.ok) return result.value;
    if (result.reason === 'duplicate') {
      throw new DuplicateResourceError(`Shipment number ${next.shipmentNumber} already exists`);
    }
    throw new ConcurrentModificationError('Shipment', current.id);
  }

  private async publishAll(events: readonly DomainEvent[]): Promise<void> {
    for (const event of events) {
      await this.events.publish(event);
    }
  }
}
