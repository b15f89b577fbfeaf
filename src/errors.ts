import {MetricSlot} from './definitions/metrics'

export enum ErrorCode {
  /** External command could not be located or exited non-zero */
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  /** Heap report contained no snapshot rows */
  EMPTY_REPORT = 'EMPTY_REPORT',
  /** Timing output had no usable `real` line */
  TIMING_FORMAT = 'TIMING_FORMAT',
  /** Results requested before every slot was measured */
  INCOMPLETE_RESULTS = 'INCOMPLETE_RESULTS'
}

/**
 * Base class of every error raised by the benchmark engine. The entry point
 * decides how each kind is presented; the engine only classifies.
 */
export class BenchmarkError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message)
    this.name = 'BenchmarkError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class ExecutionError extends BenchmarkError {
  constructor(
    public readonly commandLine: string,
    reason: string,
    public readonly exitCode?: number
  ) {
    super(`'${commandLine}' ${reason}`, ErrorCode.EXECUTION_FAILED)
    this.name = 'ExecutionError'
  }
}

export class EmptyReportError extends BenchmarkError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super(`Heap report '${source}' is unusable: ${reason}`, ErrorCode.EMPTY_REPORT)
    this.name = 'EmptyReportError'
  }
}

export class TimingFormatError extends BenchmarkError {
  constructor(reason: string) {
    super(`Unable to read execution time: ${reason}`, ErrorCode.TIMING_FORMAT)
    this.name = 'TimingFormatError'
  }
}

export class IncompleteResultsError extends BenchmarkError {
  constructor(public readonly missingSlots: MetricSlot[]) {
    super(
      `Benchmark results are incomplete. Missing: ${missingSlots.join(', ')}`,
      ErrorCode.INCOMPLETE_RESULTS
    )
    this.name = 'IncompleteResultsError'
  }
}

export function isBenchmarkError(error: unknown): error is BenchmarkError {
  return error instanceof BenchmarkError
}
