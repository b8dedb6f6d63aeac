import { jest, describe, it, expect } from '@jest/globals';
import {
  InvalidStateError,
  SagaFailedError,
  StepTimeoutError,
} from '@cargotrace/domain';
import type { CancellationTrigger, SagaRecord } from '@cargotrace/domain';
import { T0, harness, shipmentInput } from './harness.js';
import type { Harness } from './harness.js';

const trigger: CancellationTrigger = {
  reason: 'customer request',
  actor: 'ops',
  refund: { amount: 120, currency: 'USD' },
};

/** Logs every compensating call, in the order it happens, and lets it through. */
function traceCompensation(h: Harness): string[] {
  const calls: string[] = [];

  const reverse = h.infra.refunds.reverseRefund.bind(h.infra.refunds);
  jest.spyOn(h.infra.refunds, 'reverseRefund').mockImplementation(async (sagaId) => {
    calls.push('reverse-refund');
    await reverse(sagaId);
  });

  const resume = h.infra.sessions.resume.bind(h.infra.sessions);
  jest.spyOn(h.infra.sessions, 'resume').mockImplementation(async (shipmentId, at) => {
    calls.push('resume-tracking');
    await resume(shipmentId, at);
  });

  const abort = h.app.shipments.abortCancellation.bind(h.app.shipments);
  jest.spyOn(h.app.shipments, 'abortCancellation').mockImplementation(async (id, sagaId, actor) => {
    calls.push('revert-status');
    return abort(id, sagaId, actor);
  });

  const reversal = h.infra.notifications.sendCancellationReversal.bind(h.infra.notifications);
  jest.spyOn(h.infra.notifications, 'sendCancellationReversal').mockImplementation(async (shipment) => {
    calls.push('reversal-notice');
    await reversal(shipment);
  });

  return calls;
}

async function failedSaga(h: Harness, shipmentId: string): Promise<{ error: SagaFailedError; saga: SagaRecord }> {
  const error = await h.app.cancellation.cancel(shipmentId, trigger).catch((err: unknown) => err);
  if (!(error instanceof SagaFailedError)) throw new Error(`expected SagaFailedError, got ${String(error)}`);
  return { error, saga: await h.app.cancellation.getSaga(error.sagaId) };
}

describe('CancellationSaga.cancel', () => {
  it('cancels the shipment, stops tracking, notifies and refunds', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');

    const saga = await h.app.cancellation.cancel(shipment.id, trigger);

    expect(saga.status).toBe('COMPLETED');
    expect(saga.completedSteps).toEqual([
      'UpdateStatus',
      'StopTracking',
      'NotifyStakeholders',
      'ProcessRefund',
      'FinalizeStatus',
    ]);
    const cancelled = await h.app.shipments.get(shipment.id);
    expect(cancelled.status).toBe('CANCELLED');
    expect(cancelled.pendingCancellation).toBeUndefined();
    expect((await h.infra.sessions.get(shipment.id))?.state).toBe('STOPPED');
    expect(h.infra.refunds.entries.get(saga.id)?.status).toBe('PROCESSED');
    expect(h.infra.notifications.sent.map((n) => n.kind)).toEqual(['confirmation', 'cancellation_notice']);
    expect(h.transport.kinds()).toContain('ShipmentCancelled');
  });

  it('skips the refund step when none is requested', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');

    const saga = await h.app.cancellation.cancel(shipment.id, { reason: 'duplicate order', actor: 'ops' });

    expect(saga.completedSteps).not.toContain('ProcessRefund');
    expect(h.infra.refunds.entries.size).toBe(0);
  });

  it('rejects a shipment that can no longer be cancelled', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    await h.app.cancellation.cancel(shipment.id, trigger);

    await expect(h.app.cancellation.cancel(shipment.id, trigger)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('rejects a shipment that already has a cancellation in flight', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    await h.app.shipments.beginCancellation(shipment.id, 'saga-other', 'customer request', 'ops');

    await expect(h.app.cancellation.cancel(shipment.id, trigger)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('compensates in reverse order when the final step fails', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    const calls = traceCompensation(h);
    jest.spyOn(h.app.shipments, 'finalizeCancellation').mockRejectedValue(new Error('ledger offline'));

    const { error, saga } = await failedSaga(h, shipment.id);

    expect(error.failedStep).toBe('FinalizeStatus');
    expect(calls).toEqual(['reverse-refund', 'reversal-notice', 'resume-tracking', 'revert-status']);
    expect(saga).toMatchObject({
      status: 'FAILED',
      compensation: 'COMPENSATED',
      failure: { step: 'FinalizeStatus', message: 'ledger offline' },
      completedSteps: ['UpdateStatus', 'StopTracking', 'NotifyStakeholders', 'ProcessRefund'],
    });

    const restored = await h.app.shipments.get(shipment.id);
    expect(restored.status).toBe('CREATED');
    expect(restored.pendingCancellation).toBeUndefined();
    expect(h.infra.refunds.entries.get(saga.id)?.status).toBe('REVERSED');
    expect((await h.infra.sessions.get(shipment.id))?.state).toBe('ACTIVE');
  });

  it('does not reverse a refund that was never issued', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    const calls = traceCompensation(h);
    jest.spyOn(h.infra.refunds, 'processRefund').mockRejectedValue(new Error('card declined'));

    const { error } = await failedSaga(h, shipment.id);

    expect(error.failedStep).toBe('ProcessRefund');
    expect(calls).toEqual(['reversal-notice', 'resume-tracking', 'revert-status']);
  });

  it('fails a step that does not finish within the step timeout', async () => {
    const h = harness({ sagaStepTimeoutMs: 20 });
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    jest.spyOn(h.infra.sessions, 'stop').mockImplementation(() => new Promise<void>(() => undefined));

    const { error, saga } = await failedSaga(h, shipment.id);

    expect(error.failedStep).toBe('StopTracking');
    expect(error.cause).toBeInstanceOf(StepTimeoutError);
    expect(saga.failure).toEqual({
      step: 'StopTracking',
      message: 'Step StopTracking did not complete within 20ms',
    });
    expect((await h.app.shipments.get(shipment.id)).pendingCancellation).toBeUndefined();
    expect(h.infra.notifications.sent.map((n) => n.kind)).toEqual(['confirmation']);
  });

  it('reports partial compensation when the reversal notice fails', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    jest.spyOn(h.app.shipments, 'finalizeCancellation').mockRejectedValue(new Error('ledger offline'));
    jest.spyOn(h.infra.notifications, 'sendCancellationReversal').mockRejectedValue(new Error('smtp down'));

    const { saga } = await failedSaga(h, shipment.id);

    expect(saga.compensation).toBe('PARTIALLY_COMPENSATED');
    expect((await h.app.shipments.get(shipment.id)).pendingCancellation).toBeUndefined();
    expect((await h.infra.sessions.get(shipment.id))?.state).toBe('ACTIVE');
  });

  it('compensates a step whose progress could not be recorded', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    const save = h.infra.sagas.save.bind(h.infra.sagas);
    let calls = 0;
    // 1: initial record, 2: UpdateStatus started, 3: UpdateStatus completed
    jest.spyOn(h.infra.sagas, 'save').mockImplementation(async (record) => {
      if (++calls === 3) throw new Error('db down');
      return save(record);
    });

    const { error, saga } = await failedSaga(h, shipment.id);

    expect(error.failedStep).toBe('UpdateStatus');
    expect(error.cause).toEqual(new Error('db down'));
    expect(saga).toMatchObject({ status: 'FAILED', compensation: 'COMPENSATED' });
    const released = await h.app.shipments.get(shipment.id);
    expect(released.pendingCancellation).toBeUndefined();
    expect(released.status).toBe('CREATED');
  });
});

describe('CancellationSaga.recover', () => {
  it('compensates a saga a crashed process left running', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    await h.app.shipments.beginCancellation(shipment.id, 'saga-stranded', 'customer request', 'ops');
    await h.infra.sessions.stop(shipment.id, new Date(T0));
    await h.infra.sagas.save({
      id: 'saga-stranded',
      workflow: 'shipment-cancellation',
      aggregateId: shipment.id,
      trigger: { reason: 'customer request', actor: 'ops' },
      priorStatus: 'CREATED',
      completedSteps: ['UpdateStatus', 'StopTracking'],
      currentStep: 'NotifyStakeholders',
      status: 'RUNNING',
      startedAt: new Date(T0),
      updatedAt: new Date(T0),
    });

    const recovered = await h.app.cancellation.recover();

    expect(recovered).toHaveLength(1);
    expect(recovered[0]).toMatchObject({
      id: 'saga-stranded',
      status: 'FAILED',
      compensation: 'COMPENSATED',
      failure: { step: 'NotifyStakeholders' },
    });
    expect((await h.app.shipments.get(shipment.id)).pendingCancellation).toBeUndefined();
    expect((await h.infra.sessions.get(shipment.id))?.state).toBe('ACTIVE');
    expect(h.infra.notifications.sent.map((n) => n.kind)).toEqual(['confirmation']);
  });

  it('releases the shipment when the process stopped inside the first step', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    await h.app.shipments.beginCancellation(shipment.id, 'saga-early', 'customer request', 'ops');
    await h.infra.sagas.save({
      id: 'saga-early',
      workflow: 'shipment-cancellation',
      aggregateId: shipment.id,
      trigger: { reason: 'customer request', actor: 'ops' },
      priorStatus: 'CREATED',
      completedSteps: [],
      currentStep: 'UpdateStatus',
      status: 'RUNNING',
      startedAt: new Date(T0),
      updatedAt: new Date(T0),
    });

    const [recovered] = await h.app.cancellation.recover();

    expect(recovered).toMatchObject({ status: 'FAILED', compensation: 'COMPENSATED' });
    expect((await h.app.shipments.get(shipment.id)).pendingCancellation).toBeUndefined();
    const confirmed = await h.app.shipments.confirm(shipment.id, 'ops');
    expect(confirmed.status).toBe('CONFIRMED');
  });

  it('closes a saga whose shipment was already cancelled', async () => {
    const h = harness();
    const shipment = await h.app.shipments.create(shipmentInput(), 'ops');
    const done = await h.app.cancellation.cancel(shipment.id, trigger);
    await h.infra.sagas.save({ ...done, status: 'RUNNING', finishedAt: undefined });

    const [recovered] = await h.app.cancellation.recover();

    expect(recovered?.status).toBe('COMPLETED');
    expect((await h.app.cancellation.getSaga(done.id)).status).toBe('COMPLETED');
  });
});
