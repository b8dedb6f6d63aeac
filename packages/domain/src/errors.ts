export type DomainErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INVALID_LOCATION_DATA'
  | 'INVALID_STATE'
  | 'INVALID_TRANSITION'
  | 'PRECONDITION_FAILED'
  | 'NOT_FOUND'
  | 'DUPLICATE_RESOURCE'
  | 'CONCURRENT_MODIFICATION'
  | 'STALE_UPDATE'
  | 'SAGA_FAILED'
  | 'STEP_TIMEOUT';

/**
 * Base class for every business-rule failure raised by the engine.
 * `status` is the HTTP status the API surfaces it as.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  abstract readonly status: number;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends DomainError {
  readonly code: DomainErrorCode = 'INVALID_ARGUMENT';
  readonly status = 400;
}

export class InvalidLocationDataError extends InvalidArgumentError {
  override readonly code: DomainErrorCode = 'INVALID_LOCATION_DATA';
}

export class InvalidStateError extends DomainError {
  readonly code = 'INVALID_STATE';
  readonly status = 409;
}

export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION';
  readonly status = 409;

  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Cannot transition from ${from} to ${to}`);
  }
}

export class PreconditionFailedError extends DomainError {
  readonly code = 'PRECONDITION_FAILED';
  readonly status = 412;
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;

  constructor(
    readonly resource: string,
    readonly key: string,
  ) {
    super(`${resource} not found: ${key}`);
  }
}

export class DuplicateResourceError extends DomainError {
  readonly code = 'DUPLICATE_RESOURCE';
  readonly status = 409;
}

/** Optimistic-version mismatch. The caller reloads and decides whether to retry. */
export class ConcurrentModificationError extends DomainError {
  readonly code = 'CONCURRENT_MODIFICATION';
  readonly status = 409;
  override readonly retryable = true;

  constructor(
    readonly resource: string,
    readonly key: string,
  ) {
    super(`${resource} ${key} was modified concurrently; reload and retry`);
  }
}

export class StaleUpdateError extends DomainError {
  readonly code = 'STALE_UPDATE';
  readonly status = 409;

  constructor(
    readonly shipmentId: string,
    readonly reportedAt: Date,
    readonly latestAt: Date,
  ) {
    super(
      `Location report for shipment ${shipmentId} at ${reportedAt.toISOString()} ` +
        `is older than the current position at ${latestAt.toISOString()}`,
    );
  }
}

export class SagaFailedError extends DomainError {
  readonly code = 'SAGA_FAILED';
  readonly status = 502;

  constructor(
    readonly sagaId: string,
    readonly failedStep: string,
    cause: unknown,
  ) {
    super(
      `Saga ${sagaId} failed at step ${failedStep}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class StepTimeoutError extends DomainError {
  readonly code = 'STEP_TIMEOUT';
  readonly status = 504;

  constructor(
    readonly step: string,
    readonly timeoutMs: number,
  ) {
    super(`Step ${step} did not complete within ${timeoutMs}ms`);
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
