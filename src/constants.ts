import {MetricSlot} from './definitions/metrics'

export const INPUT_TEMPLATE_PATH = 'zkllvm-template-path'
export const INPUT_MEASUREMENTS = 'measurements'
export const INPUT_WORKING_DIRECTORY = 'working-directory'
export const INPUT_ASSIGNER = 'assigner'
export const INPUT_PROOF_GENERATOR = 'proof-generator'
export const INPUT_CURVE = 'curve'
export const INPUT_FAIL_ON_TARGET_EXIT_CODE = 'fail-on-target-exit-code'
export const INPUT_JOB_SUMMARY = 'job-summary'

export const DEFAULT_ASSIGNER = 'assigner'
export const DEFAULT_PROOF_GENERATOR = 'proof-generator-single-threaded'
export const DEFAULT_CURVE = 'pallas'

export const VALGRIND = 'valgrind'
export const MS_PRINT = 'ms_print'
export const TIME_SHELL = 'bash'

export const ASSIGNER_MEMORY_REPORT = 'assigner_memory_bench'
export const PROOF_MEMORY_REPORT = 'proof_memory_bench'

// Decimal gigabytes, not GiB.
export const BYTES_PER_GB = 1e9

export const SLOTS: readonly MetricSlot[] = [
  'assigner-memory',
  'assigner-time',
  'proof-memory',
  'proof-time'
]

export const SLOT_OUTPUTS: Record<MetricSlot, string> = {
  'assigner-memory': 'assigner-memory-gb',
  'assigner-time': 'assigner-time-s',
  'proof-memory': 'proof-memory-gb',
  'proof-time': 'proof-time-s'
}
