import type {
  SaveResult,
  Shipment,
  ShipmentListFilters,
  ShipmentRepositoryPort,
} from '@cargotrace/domain';
import { conflict, saved } from '@cargotrace/domain';

export class MemoryShipmentRepository implements ShipmentRepositoryPort {
  private readonly rows = new Map<string, Shipment>();

  async save(shipment: Shipment, expectedVersion: number): Promise<SaveResult<Shipment>> {
    const current = this.rows.get(shipment.id);
    if (expectedVersion === 0) {
      const clash = [...this.rows.values()].some((s) => s.shipmentNumber === shipment.shipmentNumber);
      if (current || clash) return conflict('duplicate');
    } else if (!current || current.version !== expectedVersion) {
      return conflict();
    }
    const next: Shipment = { ...shipment, version: expectedVersion + 1 };
    this.rows.set(next.id, next);
    return saved(next);
  }

  async findById(id: string): Promise<Shipment | null> {
    return this.rows.get(id) ?? null;
  }

  async findByShipmentNumber(shipmentNumber: string): Promise<Shipment | null> {
    return [...this.rows.values()].find((s) => s.shipmentNumber === shipmentNumber) ?? null;
  }

  async list(filters: ShipmentListFilters = {}): Promise<Shipment[]> {
    const offset = filters.offset ?? 0;
    const limit = filters.limit ?? 100;
    return [...this.rows.values()]
      .filter((s) => !filters.status || s.status === filters.status)
      .filter((s) => !filters.customerId || s.customerId === filters.customerId)
      .filter((s) => !filters.carrierId || s.carrierId === filters.carrierId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || a.id.localeCompare(b.id))
      .slice(offset, offset + limit);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}
