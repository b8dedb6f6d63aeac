import type { NotificationPort, Shipment, Stop } from '@cargotrace/domain';
import { getPool } from './pool.js';
import { orNull } from './sql.js';
import type { Queryable } from './pool.js';

export type NotificationKind =
  | 'confirmation'
  | 'arrival_alert'
  | 'cancellation_notice'
  | 'cancellation_reversal';

/**
 * Writes notifications to an outbox table; delivery (mail, SMS, webhooks)
 * is a separate relay that drains it.
 */
export class PgNotificationOutbox implements NotificationPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async sendConfirmation(shipment: Shipment): Promise<void> {
    await this.enqueue('confirmation', shipment, {
      shipmentNumber: shipment.shipmentNumber,
      plannedDeliveryTime: shipment.plannedDeliveryTime.toISOString(),
    });
  }

  async sendArrivalAlert(shipment: Shipment, stop: Stop, eventId: string): Promise<void> {
    await this.enqueue(
      'arrival_alert',
      shipment,
      {
        shipmentNumber: shipment.shipmentNumber,
        stopId: stop.id,
        sequenceNumber: stop.sequenceNumber,
        city: stop.location.city,
      },
      `arrival:${eventId}`,
    );
  }

  async sendCancellationNotice(shipment: Shipment, reason: string): Promise<void> {
    await this.enqueue('cancellation_notice', shipment, {
      shipmentNumber: shipment.shipmentNumber,
      reason,
    });
  }

  async sendCancellationReversal(shipment: Shipment): Promise<void> {
    await this.enqueue('cancellation_reversal', shipment, {
      shipmentNumber: shipment.shipmentNumber,
      status: shipment.status,
    });
  }

  private async enqueue(
    kind: NotificationKind,
    shipment: Shipment,
    body: Record<string, unknown>,
    dedupeKey?: string,
  ): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.notification_outbox (kind, shipment_id, recipient, body, dedupe_key)
       VALUES ($1,$2,$3,$4,$5)
       ON CONFLICT (dedupe_key) DO NOTHING`,
      [kind, shipment.id, shipment.customerId, JSON.stringify(body), orNull(dedupeKey)],
    );
  }
}
