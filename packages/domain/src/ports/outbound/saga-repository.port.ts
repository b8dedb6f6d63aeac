import type { SagaRecord, SagaStatus } from '../../entities/saga.js';

export interface SagaRepositoryPort {
  /** Upsert; a saga has a single writer so no version check is needed. */
  save(record: SagaRecord): Promise<void>;
  findById(id: string): Promise<SagaRecord | null>;
  findByStatus(statuses: readonly SagaStatus[]): Promise<SagaRecord[]>;
}
