import * as mark from './markdown'
import {SLOTS} from './constants'
import {IncompleteResultsError} from './errors'
import {BenchmarkSnapshot, MetricValue} from './definitions/metrics'

export const SUMMARY_TITLE = 'zkLLVM Benchmark Results'

interface CategoryResults {
  name: string
  memory: MetricValue
  time: MetricValue
}

function completeResults(snapshot: BenchmarkSnapshot): CategoryResults[] {
  const assignerMemory = snapshot['assigner-memory']
  const assignerTime = snapshot['assigner-time']
  const proofMemory = snapshot['proof-memory']
  const proofTime = snapshot['proof-time']
  if (!assignerMemory || !assignerTime || !proofMemory || !proofTime) {
    throw new IncompleteResultsError(
      SLOTS.filter(slot => snapshot[slot] === undefined)
    )
  }
  return [
    {name: 'Assigner', memory: assignerMemory, time: assignerTime},
    {name: 'Proof', memory: proofMemory, time: proofTime}
  ]
}

export function formatMetric(metric: MetricValue): string {
  return `${metric.value.toFixed(2)} ${metric.unit}`
}

/**
 * Renders all four metrics grouped by target. Throws
 * `IncompleteResultsError` when any slot is still empty.
 */
export function renderResults(snapshot: BenchmarkSnapshot): string {
  return completeResults(snapshot)
    .map(category =>
      [
        `${category.name}:`,
        `  Memory: ${formatMetric(category.memory)}`,
        `  Time: ${formatMetric(category.time)}`
      ].join('\n')
    )
    .join('\n')
}

export function renderSummaryTable(snapshot: BenchmarkSnapshot): string {
  const rows: mark.TableRow[] = [mark.makeHeaderRow('Target', 'Heap allocation', 'Execution time')]
  for (const category of completeResults(snapshot)) {
    rows.push([
      mark.bold(category.name),
      {content: formatMetric(category.memory), align: 'right'},
      {content: formatMetric(category.time), align: 'right'}
    ])
  }
  return `${mark.heading(2, SUMMARY_TITLE)}\n\n${mark.table(rows)}`
}
