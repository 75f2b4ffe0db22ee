export type StoreErrorCode =
  | 'CONSTRAINT_VIOLATION'
  | 'INVALID_TRANSITION'
  | 'INVALID_PHASE_TRANSITION'
  | 'INVALID_TIMESTAMP'
  | 'UNKNOWN_RESULT_SHAPE'
  | 'RELEASE_IMMUTABLE'
  | 'ALLOCATION_CONFLICT'
  | 'NOT_FOUND'
  | 'DATABASE_BUSY'

export abstract class StoreError extends Error {
  abstract readonly code: StoreErrorCode
}

export class ConstraintViolation extends StoreError {
  readonly code = 'CONSTRAINT_VIOLATION'

  constructor(
    message: string,
    public readonly table: string | null = null,
    public readonly kind: 'unique' | 'check' | 'foreign_key' | 'not_null' | 'domain' = 'domain'
  ) {
    super(message)
    this.name = 'ConstraintViolation'
  }
}

export class InvalidTransition extends StoreError {
  readonly code = 'INVALID_TRANSITION'

  constructor(
    public readonly taskId: number,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`)
    this.name = 'InvalidTransition'
  }
}

export class InvalidPhaseTransition extends StoreError {
  readonly code = 'INVALID_PHASE_TRANSITION'

  constructor(
    public readonly releaseName: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Release ${releaseName} cannot move from ${from} to ${to}`)
    this.name = 'InvalidPhaseTransition'
  }
}

export class InvalidTimestamp extends StoreError {
  readonly code = 'INVALID_TIMESTAMP'

  constructor(public readonly input: unknown, reason: string) {
    super(`Invalid timestamp ${JSON.stringify(String(input))}: ${reason}`)
    this.name = 'InvalidTimestamp'
  }
}

export class UnknownResultShape extends StoreError {
  readonly code = 'UNKNOWN_RESULT_SHAPE'

  constructor(public readonly taskType: string, reason: string) {
    super(`Unknown result shape for task type ${taskType}: ${reason}`)
    this.name = 'UnknownResultShape'
  }
}

export class ReleaseImmutable extends StoreError {
  readonly code = 'RELEASE_IMMUTABLE'

  constructor(public readonly releaseName: string) {
    super(`Release ${releaseName} has been published and can no longer change`)
    this.name = 'ReleaseImmutable'
  }
}

export class AllocationConflict extends StoreError {
  readonly code = 'ALLOCATION_CONFLICT'

  constructor(public readonly releaseName: string, attempts: number) {
    super(`Could not allocate a revision number for ${releaseName} after ${attempts} attempts`)
    this.name = 'AllocationConflict'
  }
}

export class NotFound extends StoreError {
  readonly code = 'NOT_FOUND'

  constructor(public readonly entity: string, public readonly key: string | number) {
    super(`${entity} ${key} not found`)
    this.name = 'NotFound'
  }
}

export class DatabaseBusy extends StoreError {
  readonly code = 'DATABASE_BUSY'

  constructor(message: string) {
    super(message)
    this.name = 'DatabaseBusy'
  }
}
