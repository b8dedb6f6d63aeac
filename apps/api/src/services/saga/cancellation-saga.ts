import { v4 as uuidv4 } from 'uuid';
import type {
  CancellationPort,
  CancellationStepName,
  CancellationTrigger,
  NotificationPort,
  RefundPort,
  SagaRecord,
  SagaRepositoryPort,
  TrackingSessionPort,
} from '@cargotrace/domain';
import {
  InvalidStateError,
  NotFoundError,
  SagaFailedError,
  isTerminalStatus,
} from '@cargotrace/domain';
import type { Clock } from '@cargotrace/adapters';
import { wallClockNow } from '@cargotrace/adapters';
import type { CancellableShipments } from '../shipments/shipment.service.js';
import { SagaRunner } from './saga-runner.js';
import type { SagaStep } from './saga-runner.js';

export const DEFAULT_STEP_TIMEOUT_MS = 10_000;

interface CancellationContext {
  readonly sagaId: string;
  readonly shipmentId: string;
  readonly trigger: CancellationTrigger;
}

export interface CancellationSagaDeps {
  shipments: CancellableShipments;
  sagas: SagaRepositoryPort;
  sessions: TrackingSessionPort;
  notifications: NotificationPort;
  refunds: RefundPort;
  clock?: Clock;
  newId?: () => string;
  stepTimeoutMs?: number;
}

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * UpdateStatus → StopTracking → NotifyStakeholders → ProcessRefund (when a
 * refund is requested) → FinalizeStatus. Progress is persisted after every
 * step so `recover()` can compensate what a crashed process left behind.
 */
export class CancellationSaga implements CancellationPort {
  private readonly runner: SagaRunner<CancellationContext, CancellationStepName>;
  private readonly clock: Clock;
  private readonly newId: () => string;

  constructor(private readonly deps: CancellationSagaDeps) {
    this.clock = deps.clock ?? wallClockNow;
    this.newId = deps.newId ?? uuidv4;
    this.runner = new SagaRunner(this.steps(), deps.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS);
  }

  async cancel(shipmentId: string, trigger: CancellationTrigger): Promise<SagaRecord> {
    const shipment = await this.deps.shipments.get(shipmentId);
    if (isTerminalStatus(shipment.status)) {
      throw new InvalidStateError(
        `Shipment ${shipment.shipmentNumber} is ${shipment.status} and can no longer be cancelled`,
      );
    }
    if (shipment.pendingCancellation) {
      throw new InvalidStateError(
        `Shipment ${shipment.shipmentNumber} is already being cancelled by saga ${shipment.pendingCancellation.sagaId}`,
      );
    }

    const now = this.clock();
    let record: SagaRecord = {
      id: this.newId(),
      workflow: 'shipment-cancellation',
      aggregateId: shipmentId,
      trigger,
      priorStatus: shipment.status,
      completedSteps: [],
      status: 'RUNNING',
      startedAt: now,
      updatedAt: now,
    };
    await this.deps.sagas.save(record);
    console.log(`[saga] ${record.id} cancelling ${shipment.shipmentNumber} (${trigger.reason})`);

    const update = async (patch: Partial<SagaRecord>): Promise<void> => {
      record = { ...record, ...patch, updatedAt: this.clock() };
      await this.deps.sagas.save(record);
    };

    const ctx: CancellationContext = { sagaId: record.id, shipmentId, trigger };
    const outcome = await this.runner.run(ctx, {
      stepStarted: (name) => update({ currentStep: name }),
      stepCompleted: (name) =>
        update({ completedSteps: [...record.completedSteps, name], currentStep: undefined }),
      compensating: (step, cause) =>
        update({ status: 'COMPENSATING', failure: { step, message: messageOf(cause) } }),
    });

    if (outcome.ok) {
      await update({ status: 'COMPLETED', finishedAt: this.clock() });
      console.log(`[saga] ${record.id} completed`);
      return record;
    }

    await update({ status: 'FAILED', compensation: outcome.compensation, finishedAt: this.clock() }).catch(
      (err: unknown) => {
        console.error(`[saga] ${record.id} could not record its failure; recover() will revisit it`, err);
      },
    );
    console.error(
      `[saga] ${record.id} failed at ${outcome.failedStep} (${outcome.compensation})`,
      outcome.cause,
    );
    throw new SagaFailedError(record.id, outcome.failedStep, outcome.cause);
  }

  async getSaga(sagaId: string): Promise<SagaRecord> {
    const record = await this.deps.sagas.findById(sagaId);
    if (!record) throw new NotFoundError('Saga', sagaId);
    return record;
  }

  /**
   * Compensates sagas left RUNNING or COMPENSATING. A saga whose shipment
   * already reached CANCELLED is closed as COMPLETED instead.
   */
  async recover(): Promise<SagaRecord[]> {
    const stranded = await this.deps.sagas.findByStatus(['RUNNING', 'COMPENSATING']);
    const recovered: SagaRecord[] = [];

    for (const saga of stranded) {
      const ctx: CancellationContext = {
        sagaId: saga.id,
        shipmentId: saga.aggregateId,
        trigger: saga.trigger,
      };
      const shipment = await this.deps.shipments.find(saga.aggregateId);
      const now = this.clock();

      let next: SagaRecord;
      if (shipment?.status === 'CANCELLED' && !shipment.pendingCancellation) {
        next = { ...saga, status: 'COMPLETED', currentStep: undefined, updatedAt: now, finishedAt: now };
      } else {
        const compensation = await this.runner.compensateLedger(ctx, saga.completedSteps, saga.currentStep);
        next = {
          ...saga,
          status: 'FAILED',
          compensation,
          failure: saga.failure ?? {
            step: saga.currentStep ?? 'unknown',
            message: 'interrupted before completion; compensated on recovery',
          },
          updatedAt: now,
          finishedAt: now,
        };
      }
      await this.deps.sagas.save(next);
      console.log(`[saga] recovered ${saga.id} as ${next.status}`);
      recovered.push(next);
    }
    return recovered;
  }

  // ─── Steps ──────────────────────────────────────────────────────────────────

  private steps(): SagaStep<CancellationContext, CancellationStepName>[] {
    const { shipments, sessions, notifications, refunds } = this.deps;
    return [
      {
        name: 'UpdateStatus',
        run: async (c) => {
          await shipments.beginCancellation(c.shipmentId, c.sagaId, c.trigger.reason, c.trigger.actor);
        },
        // only clears a marker this saga owns
        compensate: async (c) => {
          await shipments.abortCancellation(c.shipmentId, c.sagaId, c.trigger.actor);
        },
        compensateIfInterrupted: true,
      },
      {
        name: 'StopTracking',
        run: (c) => sessions.stop(c.shipmentId, this.clock()),
        compensate: (c) => sessions.resume(c.shipmentId, this.clock()),
        compensateIfInterrupted: true,
      },
      {
        name: 'NotifyStakeholders',
        run: async (c) => {
          const shipment = await shipments.get(c.shipmentId);
          await notifications.sendCancellationNotice(shipment, c.trigger.reason);
        },
        compensate: async (c) => {
          const shipment = await shipments.get(c.shipmentId);
          await notifications.sendCancellationReversal(shipment);
        },
      },
      {
        name: 'ProcessRefund',
        when: (c) => c.trigger.refund !== undefined,
        run: async (c) => {
          const refund = c.trigger.refund;
          if (!refund) return;
          const { refundId } = await refunds.processRefund({
            sagaId: c.sagaId,
            shipmentId: c.shipmentId,
            amount: refund.amount,
            currency: refund.currency,
          });
          console.log(`[saga] ${c.sagaId} refund ${refundId} issued`);
        },
        compensate: (c) => refunds.reverseRefund(c.sagaId),
        compensateIfInterrupted: true,
      },
      {
        name: 'FinalizeStatus',
        run: async (c) => {
          await shipments.finalizeCancellation(c.shipmentId, c.sagaId, c.trigger.reason, c.trigger.actor);
        },
      },
    ];
  }
}
