import type {
  CancellationStepName,
  CancellationTrigger,
  CompensationOutcome,
  SagaFailure,
  SagaRecord,
  SagaRepositoryPort,
  SagaStatus,
  ShipmentStatus,
} from '@cargotrace/domain';
import { getPool } from './pool.js';
import type { Queryable } from './pool.js';
import { opt, orNull } from './sql.js';

export class PgSagaRepository implements SagaRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async save(record: SagaRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO tracking.sagas
         (id, workflow, aggregate_id, trigger, prior_status, completed_steps, current_step,
          status, compensation, failure, started_at, updated_at, finished_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)
       ON CONFLICT (id) DO UPDATE SET
         completed_steps = EXCLUDED.completed_steps,
         current_step = EXCLUDED.current_step,
         status = EXCLUDED.status,
         compensation = EXCLUDED.compensation,
         failure = EXCLUDED.failure,
         updated_at = EXCLUDED.updated_at,
         finished_at = EXCLUDED.finished_at`,
      [
        record.id,
        record.workflow,
        record.aggregateId,
        JSON.stringify(record.trigger),
        record.priorStatus,
        [...record.completedSteps],
        orNull(record.currentStep),
        record.status,
        orNull(record.compensation),
        record.failure ? JSON.stringify(record.failure) : null,
        record.startedAt,
        record.updatedAt,
        orNull(record.finishedAt),
      ],
    );
  }

  async findById(id: string): Promise<SagaRecord | null> {
    const { rows } = await this.db.query(`SELECT * FROM tracking.sagas WHERE id = $1`, [id]);
    return rows[0] ? mapSagaRow(rows[0]) : null;
  }

  async findByStatus(statuses: readonly SagaStatus[]): Promise<SagaRecord[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM tracking.sagas WHERE status = ANY($1) ORDER BY started_at, id`,
      [[...statuses]],
    );
    return rows.map(mapSagaRow);
  }
}

function mapSagaRow(row: Record<string, unknown>): SagaRecord {
  return {
    id: row['id'] as string,
    workflow: 'shipment-cancellation',
    aggregateId: row['aggregate_id'] as string,
    trigger: row['trigger'] as CancellationTrigger,
    priorStatus: row['prior_status'] as ShipmentStatus,
    completedSteps: (row['completed_steps'] as CancellationStepName[] | null) ?? [],
    currentStep: opt<CancellationStepName>(row['current_step']),
    status: row['status'] as SagaStatus,
    compensation: opt<CompensationOutcome>(row['compensation']),
    failure: opt<SagaFailure>(row['failure']),
    startedAt: row['started_at'] as Date,
    updatedAt: row['updated_at'] as Date,
    finishedAt: opt<Date>(row['finished_at']),
  };
}
