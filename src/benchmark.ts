import * as c from './constants'
import * as core from '@actions/core'
import {join} from 'path'
import {EmptyReportError, ExecutionError, TimingFormatError} from './errors'
import {MetricSlot, MetricValue} from './definitions/metrics'
import {TargetCommand, Toolchain} from './toolchain'
import {BenchmarkState} from './state'
import {ExecResult, exec, toCommandString} from './utils'
import {parseElapsedSeconds} from './parsers/timing'
import {parseHeapReport} from './parsers/massif'
import {renderResults} from './reporter'

// 126: found but not executable, 127: not found
const TARGET_NOT_RUNNABLE_EXIT_CODES = [126, 127]

export interface BenchmarkOptions {
  toolchain: Toolchain
  /** Where heap reports are written, defaults to the current directory */
  workingDirectory?: string
  /** Whether a non-zero exit of a profiled target fails the measurement */
  failOnTargetExitCode?: boolean
}

/**
 * One benchmarking session. Each `measure*` call runs its external command
 * to completion, parses the output and records exactly one slot; slots that
 * were already recorded are left alone when a measurement fails.
 */
export class Benchmark {
  private readonly workingDirectory: string
  private readonly failOnTargetExitCode: boolean

  constructor(
    private readonly options: BenchmarkOptions,
    readonly state: BenchmarkState = new BenchmarkState()
  ) {
    this.workingDirectory = options.workingDirectory || process.cwd()
    this.failOnTargetExitCode = options.failOnTargetExitCode ?? true
  }

  async measureAssignerMemory(): Promise<MetricValue> {
    return this.measureHeapAllocation(
      'assigner-memory',
      this.options.toolchain.assigner,
      c.ASSIGNER_MEMORY_REPORT
    )
  }

  async measureProofMemory(): Promise<MetricValue> {
    return this.measureHeapAllocation(
      'proof-memory',
      this.options.toolchain.proofGenerator,
      c.PROOF_MEMORY_REPORT
    )
  }

  async measureAssignerTime(): Promise<MetricValue> {
    return this.measureExecutionTime(
      'assigner-time',
      this.options.toolchain.assigner
    )
  }

  async measureProofTime(): Promise<MetricValue> {
    return this.measureExecutionTime(
      'proof-time',
      this.options.toolchain.proofGenerator
    )
  }

  async measure(slot: MetricSlot): Promise<MetricValue> {
    switch (slot) {
      case 'assigner-memory':
        return this.measureAssignerMemory()
      case 'assigner-time':
        return this.measureAssignerTime()
      case 'proof-memory':
        return this.measureProofMemory()
      case 'proof-time':
        return this.measureProofTime()
    }
  }

  displayResults(): string {
    return renderResults(this.state.snapshot())
  }

  private async measureHeapAllocation(
    slot: MetricSlot,
    target: TargetCommand,
    reportName: string
  ): Promise<MetricValue> {
    const cwd = this.workingDirectory
    const reportFile = join(cwd, reportName)
    await this.runTarget(c.VALGRIND, [
      '--tool=massif',
      `--massif-out-file=${reportFile}`,
      target.executable,
      ...target.args
    ])
    const {stdout} = await exec(c.MS_PRINT, [reportFile], {cwd, silent: true})
    const report = parseHeapReport(stdout)
    if (!report.ok) {
      throw new EmptyReportError(reportFile, report.reason)
    }
    core.debug(
      `${report.value.rows.length} snapshots in ${reportFile}, ${report.value.totalBytes} bytes in total`
    )
    return this.record(slot, {value: report.value.gigabytes, unit: 'GB'})
  }

  private async measureExecutionTime(
    slot: MetricSlot,
    target: TargetCommand
  ): Promise<MetricValue> {
    // bash's `time` keyword prints real/user/sys on stderr
    const {stderr} = await this.runTarget(c.TIME_SHELL, [
      '-c',
      'time "$@"',
      'time',
      target.executable,
      ...target.args
    ])
    core.debug(`Timing output of ${target.executable}:\n${stderr}`)
    const elapsed = parseElapsedSeconds(stderr)
    if (!elapsed.ok) {
      throw new TimingFormatError(elapsed.reason)
    }
    return this.record(slot, {value: elapsed.value, unit: 's'})
  }

  /**
   * Runs a profiling wrapper around a target. The wrapper reports a target it
   * cannot find or execute through the shell's exit codes, which stay fatal
   * even when other non-zero exits are tolerated.
   */
  private async runTarget(commandLine: string, args: string[]): Promise<ExecResult> {
    const result = await exec(commandLine, args, {
      cwd: this.workingDirectory,
      ignoreReturnCode: !this.failOnTargetExitCode
    })
    if (TARGET_NOT_RUNNABLE_EXIT_CODES.includes(result.exitCode)) {
      throw new ExecutionError(
        toCommandString(commandLine, args),
        `could not run its target: exit code ${result.exitCode}`,
        result.exitCode
      )
    }
    return result
  }

  private record(slot: MetricSlot, value: MetricValue): MetricValue {
    this.state.record(slot, value)
    core.info(`Recorded ${slot}: ${value.value}${value.unit}`)
    return value
  }
}
