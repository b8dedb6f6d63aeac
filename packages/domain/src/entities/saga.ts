import type { ShipmentStatus } from './shipment.js';

export type SagaStatus = 'RUNNING' | 'COMPENSATING' | 'COMPLETED' | 'FAILED';

export type CompensationOutcome = 'COMPENSATED' | 'PARTIALLY_COMPENSATED';

export type CancellationStepName =
  | 'UpdateStatus'
  | 'StopTracking'
  | 'NotifyStakeholders'
  | 'ProcessRefund'
  | 'FinalizeStatus';

export interface CancellationTrigger {
  readonly reason: string;
  readonly actor: string;
  readonly refund?: {
    readonly amount: number;
    readonly currency: string;
  };
}

export interface SagaFailure {
  readonly step: string;
  readonly message: string;
}

export interface SagaRecord {
  readonly id: string;
  readonly workflow: 'shipment-cancellation';
  readonly aggregateId: string;
  readonly trigger: CancellationTrigger;
  /** Shipment status when the saga started; what compensation reverts to. */
  readonly priorStatus: ShipmentStatus;
  readonly completedSteps: readonly CancellationStepName[];
  readonly currentStep?: CancellationStepName;
  readonly status: SagaStatus;
  readonly compensation?: CompensationOutcome;
  readonly failure?: SagaFailure;
  readonly startedAt: Date;
  readonly updatedAt: Date;
  readonly finishedAt?: Date;
}
