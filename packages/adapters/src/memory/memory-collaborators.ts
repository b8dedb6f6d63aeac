import type {
  DomainEvent,
  EventStreamPort,
  Milestone,
  NotificationPort,
  RecordedEvent,
  RefundPort,
  RefundRequest,
  Shipment,
  Stop,
  TrackingSession,
  TrackingSessionPort,
  TrackingSessionState,
} from '@cargotrace/domain';

// ─── Tracking sessions ────────────────────────────────────────────────────────

export class MemoryTrackingSessions implements TrackingSessionPort {
  private readonly sessions = new Map<string, TrackingSession>();

  async start(shipmentId: string, at: Date): Promise<void> {
    if (this.sessions.has(shipmentId)) return;
    this.sessions.set(shipmentId, { shipmentId, state: 'ACTIVE', startedAt: at, updatedAt: at });
  }

  async stop(shipmentId: string, at: Date): Promise<void> {
    this.set(shipmentId, 'STOPPED', at);
  }

  async resume(shipmentId: string, at: Date): Promise<void> {
    this.set(shipmentId, 'ACTIVE', at);
  }

  async get(shipmentId: string): Promise<TrackingSession | null> {
    return this.sessions.get(shipmentId) ?? null;
  }

  private set(shipmentId: string, state: TrackingSessionState, at: Date): void {
    const current = this.sessions.get(shipmentId);
    this.sessions.set(shipmentId, {
      shipmentId,
      state,
      startedAt: current?.startedAt ?? at,
      updatedAt: at,
    });
  }
}

// ─── Event stream ─────────────────────────────────────────────────────────────

export class MemoryEventStream implements EventStreamPort {
  private readonly streams = new Set<string>();
  private readonly events = new Map<string, RecordedEvent>();
  private readonly milestones = new Map<string, Milestone>();

  async initialize(shipmentId: string): Promise<void> {
    this.streams.add(shipmentId);
  }

  hasStream(shipmentId: string): boolean {
    return this.streams.has(shipmentId);
  }

  async record(event: DomainEvent): Promise<void> {
    if (this.events.has(event.eventId)) return;
    this.events.set(event.eventId, {
      eventId: event.eventId,
      shipmentId: event.aggregateId,
      kind: event.kind,
      occurredAt: event.occurredAt,
      payload: { ...event.payload },
    });
  }

  async createMilestone(milestone: Milestone): Promise<void> {
    if (!this.milestones.has(milestone.eventId)) this.milestones.set(milestone.eventId, milestone);
  }

  async listEvents(shipmentId: string): Promise<RecordedEvent[]> {
    return [...this.events.values()].filter((e) => e.shipmentId === shipmentId);
  }

  async listMilestones(shipmentId: string): Promise<Milestone[]> {
    return [...this.milestones.values()].filter((m) => m.shipmentId === shipmentId);
  }
}

// ─── Notifications ────────────────────────────────────────────────────────────

export interface SentNotification {
  kind: 'confirmation' | 'arrival_alert' | 'cancellation_notice' | 'cancellation_reversal';
  shipmentId: string;
  detail?: string;
}

/** Keeps every notification in `sent`, in order. */
export class MemoryNotifications implements NotificationPort {
  readonly sent: SentNotification[] = [];
  private readonly alertedEvents = new Set<string>();

  async sendConfirmation(shipment: Shipment): Promise<void> {
    this.sent.push({ kind: 'confirmation', shipmentId: shipment.id });
  }

  async sendArrivalAlert(shipment: Shipment, stop: Stop, eventId: string): Promise<void> {
    if (this.alertedEvents.has(eventId)) return;
    this.alertedEvents.add(eventId);
    this.sent.push({ kind: 'arrival_alert', shipmentId: shipment.id, detail: stop.id });
  }

  async sendCancellationNotice(shipment: Shipment, reason: string): Promise<void> {
    this.sent.push({ kind: 'cancellation_notice', shipmentId: shipment.id, detail: reason });
  }

  async sendCancellationReversal(shipment: Shipment): Promise<void> {
    this.sent.push({ kind: 'cancellation_reversal', shipmentId: shipment.id });
  }
}

// ─── Refunds ──────────────────────────────────────────────────────────────────

export interface RefundEntry extends RefundRequest {
  refundId: string;
  status: 'PROCESSED' | 'REVERSED';
}

export class MemoryRefunds implements RefundPort {
  readonly entries = new Map<string, RefundEntry>();
  private seq = 0;

  async processRefund(request: RefundRequest): Promise<{ refundId: string }> {
    const existing = this.entries.get(request.sagaId);
    if (existing) return { refundId: existing.refundId };
    const refundId = `refund-${++this.seq}`;
    this.entries.set(request.sagaId, { ...request, refundId, status: 'PROCESSED' });
    return { refundId };
  }

  async reverseRefund(sagaId: string): Promise<void> {
    const entry = this.entries.get(sagaId);
    if (entry?.status === 'PROCESSED') this.entries.set(sagaId, { ...entry, status: 'REVERSED' });
  }
}
