import type { Shipment, Stop } from '../../entities/shipment.js';

export interface NotificationPort {
  sendConfirmation(shipment: Shipment): Promise<void>;
  /** Sent at most once per `eventId`, the event that reported the arrival. */
  sendArrivalAlert(shipment: Shipment, stop: Stop, eventId: string): Promise<void>;
  sendCancellationNotice(shipment: Shipment, reason: string): Promise<void>;
  sendCancellationReversal(shipment: Shipment): Promise<void>;
}
