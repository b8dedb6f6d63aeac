import type {
  DomainEvent,
  DomainEventKind,
  DomainEventOf,
  EventTopic,
  EventTransportPort,
} from '@cargotrace/domain';
import { topicFor } from '@cargotrace/domain';

// ─── Types ────────────────────────────────────────────────────────────────────

export type BoundedContext = 'shipment' | 'location' | 'notification' | 'event-stream';

export interface Subscriber<K extends DomainEventKind> {
  readonly name: string;
  readonly context: BoundedContext;
  readonly handle: (event: DomainEventOf<K>) => Promise<void>;
}

/** Subscribed to every kind. */
export interface UniversalSubscriber {
  readonly name: string;
  readonly context: BoundedContext;
  readonly handle: (event: DomainEvent) => Promise<void>;
}

/** One entry per event kind; adding a kind without routing it fails to compile. */
export type SubscriptionTable = {
  readonly [K in DomainEventKind]: readonly Subscriber<K>[];
};

export interface SubscriberOutcome {
  subscriber: string;
  context: BoundedContext;
  ok: boolean;
  error?: string;
}

export interface PublishReport {
  eventId: string;
  kind: DomainEventKind;
  topic: EventTopic;
  transported: boolean;
  outcomes: SubscriberOutcome[];
}

export interface DomainEventPublisher {
  publish(event: DomainEvent): Promise<PublishReport>;
}

interface Invocation {
  name: string;
  context: BoundedContext;
  run: () => Promise<void>;
}

function invocations<K extends DomainEventKind>(
  table: SubscriptionTable,
  event: DomainEventOf<K>,
): Invocation[] {
  const subscribers: readonly Subscriber<K>[] = table[event.kind];
  return subscribers.map((s) => ({
    name: s.name,
    context: s.context,
    run: () => s.handle(event),
  }));
}

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

// ─── Choreographer ────────────────────────────────────────────────────────────

/**
 * Sole writer of cross-context side effects. Every event goes to the transport
 * first, then to each subscriber of its kind. Subscribers run independently:
 * a failure is logged and reported, never retried and never rolled back.
 */
export class EventChoreographer implements DomainEventPublisher {
  private table: SubscriptionTable | null = null;

  constructor(private readonly transport: EventTransportPort) {}

  /** Installs the subscription table; called once by the composition root. */
  wire(table: SubscriptionTable): void {
    if (this.table) throw new Error('[choreographer] subscriptions are already wired');
    this.table = table;
  }

  async publish(event: DomainEvent): Promise<PublishReport> {
    if (!this.table) throw new Error('[choreographer] publish called before wire()');

    const topic = topicFor(event.kind);
    let transported = true;
    try {
      await this.transport.publish(topic, event.aggregateId, event);
    } catch (err) {
      transported = false;
      console.error(`[choreographer] transport rejected ${event.kind} ${event.eventId}`, err);
    }

    const calls = invocations(this.table, event);
    const settled = await Promise.allSettled(calls.map((c) => c.run()));

    const outcomes = calls.map((call, i): SubscriberOutcome => {
      const result = settled[i];
      if (result?.status === 'rejected') {
        console.error(
          `[choreographer] ${call.name} failed on ${event.kind} ${event.eventId}:`,
          describeError(result.reason),
        );
        return { subscriber: call.name, context: call.context, ok: false, error: describeError(result.reason) };
      }
      return { subscriber: call.name, context: call.context, ok: true };
    });

    return { eventId: event.eventId, kind: event.kind, topic, transported, outcomes };
  }
}
