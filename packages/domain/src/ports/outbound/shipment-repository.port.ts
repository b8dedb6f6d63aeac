import type { Shipment, ShipmentStatus } from '../../entities/shipment.js';
import type { SaveResult } from './save-result.port.js';

export interface ShipmentListFilters {
  status?: ShipmentStatus;
  customerId?: string;
  carrierId?: string;
  limit?: number;
  offset?: number;
}

export interface ShipmentRepositoryPort {
  /**
   * Writes `shipment` only if the stored version still equals `expectedVersion`
   * (0 inserts). The returned value carries `expectedVersion + 1`.
   * A clash on `shipmentNumber` yields `duplicate`.
   */
  save(shipment: Shipment, expectedVersion: number): Promise<SaveResult<Shipment>>;
  findById(id: string): Promise<Shipment | null>;
  findByShipmentNumber(shipmentNumber: string): Promise<Shipment | null>;
  list(filters?: ShipmentListFilters): Promise<Shipment[]>;
  delete(id: string): Promise<boolean>;
}
