import type { Shipment, StopStatus } from '../../entities/shipment.js';
import type { CancellationTrigger, SagaRecord } from '../../entities/saga.js';
import type { NewShipmentInput, NewStopInput } from '../../rules/shipment-state-machine.js';
import type { ShipmentListFilters } from '../outbound/shipment-repository.port.js';

export interface ShipmentCommandPort {
  create(input: NewShipmentInput, actor: string): Promise<Shipment>;
  get(id: string): Promise<Shipment>;
  getByNumber(shipmentNumber: string): Promise<Shipment>;
  list(filters?: ShipmentListFilters): Promise<Shipment[]>;
  delete(id: string): Promise<void>;

  confirm(id: string, actor: string): Promise<Shipment>;
  dispatch(id: string, actor: string): Promise<Shipment>;
  startTransit(id: string, actor: string): Promise<Shipment>;
  raiseException(id: string, reason: string, actor: string): Promise<Shipment>;
  resolveException(id: string, actor: string): Promise<Shipment>;
  deliver(id: string, deliveryTime: Date, actor: string): Promise<Shipment>;
  updateEstimatedDelivery(id: string, eta: Date, actor: string): Promise<Shipment>;

  addStop(id: string, stop: NewStopInput, actor: string): Promise<Shipment>;
  removeStop(id: string, stopId: string, actor: string): Promise<Shipment>;
  updateStopStatus(id: string, stopId: string, status: StopStatus, actor: string): Promise<Shipment>;
}

export interface CancellationPort {
  /** Runs the cancellation workflow to completion; throws `SagaFailedError` after compensating. */
  cancel(shipmentId: string, trigger: CancellationTrigger): Promise<SagaRecord>;
  getSaga(sagaId: string): Promise<SagaRecord>;
  /** Compensates every saga a crashed process left unfinished. */
  recover(): Promise<SagaRecord[]>;
}
