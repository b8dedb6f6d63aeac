import type { DomainEvent, EventTopic } from '../../entities/domain-event.js';

export interface EventTransportPort {
  /** Resolves once the transport has accepted the event. */
  publish(topic: EventTopic, partitionKey: string, event: DomainEvent): Promise<void>;
}
