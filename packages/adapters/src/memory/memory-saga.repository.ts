import type { SagaRecord, SagaRepositoryPort, SagaStatus } from '@cargotrace/domain';

export class MemorySagaRepository implements SagaRepositoryPort {
  private readonly rows = new Map<string, SagaRecord>();

  async save(record: SagaRecord): Promise<void> {
    this.rows.set(record.id, record);
  }

  async findById(id: string): Promise<SagaRecord | null> {
    return this.rows.get(id) ?? null;
  }

  async findByStatus(statuses: readonly SagaStatus[]): Promise<SagaRecord[]> {
    return [...this.rows.values()]
      .filter((r) => statuses.includes(r.status))
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime() || a.id.localeCompare(b.id));
  }
}
