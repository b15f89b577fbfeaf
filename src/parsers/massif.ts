import {BYTES_PER_GB} from '../constants'
import {
  HeapReport,
  HeapReportRow,
  ParseResult,
  malformed,
  parsed
} from '../definitions/metrics'

// n, time(i), total(B), useful-heap(B), extra-heap(B), stacks(B)
const COLUMN_COUNT = 6
const INTEGER_COLUMN = /^\d{1,3}(,\d{3})*$|^\d+$/

export function toGigabytes(bytes: number): number {
  return bytes / BYTES_PER_GB
}

function toInteger(column: string): number {
  return parseInt(column.replace(/,/g, ''), 10)
}

/**
 * Reads one snapshot row of an `ms_print` table. Anything that is not six
 * integer columns (headers, separators, the graph, allocation trees, a
 * `Total` line) yields `undefined`.
 */
export function parseHeapReportRow(line: string): HeapReportRow | undefined {
  const columns = line.trim().split(/\s+/)
  if (
    columns.length !== COLUMN_COUNT ||
    !columns.every(column => INTEGER_COLUMN.test(column))
  ) {
    return undefined
  }
  const [n, time, total, usefulHeap, extraHeap, stacks] = columns.map(toInteger)
  return {
    n,
    time,
    totalBytes: total,
    usefulHeapBytes: usefulHeap,
    extraHeapBytes: extraHeap,
    stacksBytes: stacks
  }
}

/**
 * Sums the `total(B)` column over every snapshot row of a heap report.
 */
export function parseHeapReport(output: string): ParseResult<HeapReport> {
  const rows: HeapReportRow[] = []
  for (const line of output.split(/\r?\n/)) {
    const row = parseHeapReportRow(line)
    if (row) {
      rows.push(row)
    }
  }
  if (rows.length === 0) {
    return malformed('no snapshot rows found')
  }
  const totalBytes = rows.reduce((sum, row) => sum + row.totalBytes, 0)
  return parsed({rows, totalBytes, gigabytes: toGigabytes(totalBytes)})
}
