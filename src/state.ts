import * as core from '@actions/core'
import {SLOTS} from './constants'
import {
  BenchmarkSnapshot,
  MetricSlot,
  MetricValue
} from './definitions/metrics'

/**
 * Metric slots collected during one benchmarking session. Slots may be
 * recorded in any order; recording a slot again replaces its value so a
 * single measurement can be re-run without touching the others.
 */
export class BenchmarkState {
  private readonly slots = new Map<MetricSlot, MetricValue>()

  record(slot: MetricSlot, value: MetricValue): void {
    const previous = this.slots.get(slot)
    if (previous) {
      core.debug(
        `Replacing ${slot} value ${previous.value}${previous.unit} with ${value.value}${value.unit}`
      )
    }
    this.slots.set(slot, {...value})
  }

  snapshot(): BenchmarkSnapshot {
    const snapshot: Partial<Record<MetricSlot, MetricValue>> = {}
    for (const [slot, value] of this.slots) {
      snapshot[slot] = Object.freeze({...value})
    }
    return Object.freeze(snapshot)
  }

  missingSlots(): MetricSlot[] {
    return SLOTS.filter(slot => !this.slots.has(slot))
  }
}
