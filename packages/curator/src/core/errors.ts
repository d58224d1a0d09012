/**
 * Curator Error Types
 *
 * Structured error classes for the curation core. Field-level rejections are
 * NOT errors (they are returned as reason codes); these classes cover
 * construction failures, storage faults and run-level conditions.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

// ============================================================================
// Base
// ============================================================================

export type CuratorErrorCode =
  | 'INVALID_ENVELOPE'
  | 'PARTITION_LOCKED'
  | 'PARTITION_FORMAT'
  | 'PARTITION_NOT_FOUND'
  | 'RECORD_NOT_FOUND'
  | 'STAGE_PREREQUISITE'
  | 'GOLD_SET_FORMAT'
  | 'ARTIFACTS_CLOSED'
  | 'ADAPTER_TIMEOUT'
  | 'RETRY_EXHAUSTED'
  | 'CONFIG';

/**
 * Base class for every error thrown by the curator
 */
export class CuratorError extends Error {
  constructor(
    message: string,
    public readonly code: CuratorErrorCode
  ) {
    super(message);
    this.name = 'CuratorError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isCuratorError(error: unknown): error is CuratorError {
  return error instanceof CuratorError;
}

/**
 * Normalize an unknown thrown value into a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Envelope / Trust Model
// ============================================================================

/**
 * Thrown when a candidate envelope fails construction-time validation
 * (confidence out of range, empty source, bad timestamp, manual override from
 * an automated path).
 */
export class InvalidEnvelopeError extends CuratorError {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message, 'INVALID_ENVELOPE');
    this.name = 'InvalidEnvelopeError';
  }
}

// ============================================================================
// Storage
// ============================================================================

export interface LockHolder {
  readonly pid: number;
  readonly acquired_at: string;
}

/**
 * Another writer holds the partition's advisory lock
 */
export class PartitionLockError extends CuratorError {
  constructor(
    public readonly partition: string,
    public readonly holder: LockHolder | null
  ) {
    super(
      holder
        ? `Partition ${partition} is locked by pid ${holder.pid} since ${holder.acquired_at}`
        : `Partition ${partition} is locked`,
      'PARTITION_LOCKED'
    );
    this.name = 'PartitionLockError';
  }
}

/**
 * A partition or provenance file did not match the expected shape
 */
export class PartitionFormatError extends CuratorError {
  constructor(
    public readonly filePath: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid partition data in ${filePath}: ${issues.join('; ')}`, 'PARTITION_FORMAT');
    this.name = 'PartitionFormatError';
  }
}

export class PartitionNotFoundError extends CuratorError {
  constructor(public readonly partition: string) {
    super(`Partition not found: ${partition}`, 'PARTITION_NOT_FOUND');
    this.name = 'PartitionNotFoundError';
  }
}

export class RecordNotFoundError extends CuratorError {
  constructor(
    public readonly partition: string,
    public readonly recordId: string
  ) {
    super(`Record ${recordId} not found in partition ${partition}`, 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
  }
}

// ============================================================================
// Orchestration
// ============================================================================

/**
 * A stage's prerequisite was not met for a partition.
 * Recorded in the run summary; never thrown past the orchestrator.
 */
export class StagePrerequisiteError extends CuratorError {
  constructor(
    public readonly stage: string,
    public readonly partition: string,
    public readonly satisfiedRatio: number,
    public readonly requiredRatio: number
  ) {
    super(
      `Stage ${stage} prerequisite unmet for ${partition}: ` +
        `${(satisfiedRatio * 100).toFixed(1)}% satisfied, ${(requiredRatio * 100).toFixed(0)}% required`,
      'STAGE_PREREQUISITE'
    );
    this.name = 'StagePrerequisiteError';
  }
}

export class ArtifactsClosedError extends CuratorError {
  constructor(public readonly runId: string) {
    super(`Run artifacts for ${runId} are closed`, 'ARTIFACTS_CLOSED');
    this.name = 'ArtifactsClosedError';
  }
}

export class GoldSetFormatError extends CuratorError {
  constructor(
    public readonly source: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid gold set ${source}: ${issues.join('; ')}`, 'GOLD_SET_FORMAT');
    this.name = 'GoldSetFormatError';
  }
}

// ============================================================================
// Adapter boundary
// ============================================================================

export class AdapterTimeoutError extends CuratorError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'ADAPTER_TIMEOUT');
    this.name = 'AdapterTimeoutError';
  }
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly delayMs: number;
  readonly error: Error;
}

/**
 * Retry exhausted error (thrown after max attempts or on a non-retryable error)
 */
export class RetryExhaustedError extends CuratorError {
  constructor(
    public readonly attempts: readonly RetryAttempt[],
    public readonly lastError: Error
  ) {
    super(
      `Retry exhausted after ${attempts.length} attempts: ${lastError.message}`,
      'RETRY_EXHAUSTED'
    );
    this.name = 'RetryExhaustedError';
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigError extends CuratorError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Node error narrowing
// ============================================================================

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
