import type { DomainEvent, DomainEventKind } from '../../entities/domain-event.js';

export interface RecordedEvent {
  readonly eventId: string;
  readonly shipmentId: string;
  readonly kind: DomainEventKind;
  readonly occurredAt: Date;
  readonly payload: Readonly<Record<string, unknown>>;
}

export interface Milestone {
  /** Id of the event that produced it; also the idempotency key. */
  readonly eventId: string;
  readonly shipmentId: string;
  readonly description: string;
  readonly occurredAt: Date;
}

/** Per-shipment timeline consumed by presentation layers. */
export interface EventStreamPort {
  initialize(shipmentId: string, at: Date): Promise<void>;
  /** Duplicate deliveries of the same `eventId` are ignored. */
  record(event: DomainEvent): Promise<void>;
  createMilestone(milestone: Milestone): Promise<void>;
  listEvents(shipmentId: string): Promise<RecordedEvent[]>;
  listMilestones(shipmentId: string): Promise<Milestone[]>;
}
