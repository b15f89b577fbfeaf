export type MetricSlot =
  | 'assigner-memory'
  | 'assigner-time'
  | 'proof-memory'
  | 'proof-time'

export type MetricUnit = 'GB' | 's'

export type MetricValue = {value: number; unit: MetricUnit}

export type BenchmarkSnapshot = Readonly<
  Partial<Record<MetricSlot, MetricValue>>
>

/** Outcome of reducing external tool output to a value. */
export type ParseResult<T> = {ok: true; value: T} | {ok: false; reason: string}

export function parsed<T>(value: T): ParseResult<T> {
  return {ok: true, value}
}

export function malformed<T>(reason: string): ParseResult<T> {
  return {ok: false, reason}
}

export interface HeapReportRow {
  n: number
  time: number
  totalBytes: number
  usefulHeapBytes: number
  extraHeapBytes: number
  stacksBytes: number
}

export interface HeapReport {
  rows: HeapReportRow[]
  totalBytes: number
  gigabytes: number
}
