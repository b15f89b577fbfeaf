import * as c from './constants'
import * as core from '@actions/core'
import {Benchmark} from './benchmark'
import {MetricSlot} from './definitions/metrics'
import {createToolchain, resolveArtifacts} from './toolchain'
import {isBenchmarkError, IncompleteResultsError} from './errors'
import {renderSummaryTable, SUMMARY_TITLE} from './reporter'

function isMetricSlot(name: string): name is MetricSlot {
  return c.SLOTS.some(slot => slot === name)
}

export function parseMeasurements(measurementsString: string): MetricSlot[] {
  if (measurementsString.trim().length === 0) {
    return [...c.SLOTS]
  }
  const measurements: MetricSlot[] = []
  for (const name of measurementsString.split(',').map(x => x.trim())) {
    if (!isMetricSlot(name)) {
      throw new Error(
        `Unsupported measurement: '${name}'. Supported measurements are: ${c.SLOTS.join(', ')}`
      )
    }
    if (!measurements.includes(name)) {
      measurements.push(name)
    }
  }
  return measurements
}

export async function run(): Promise<void> {
  try {
    const templatePath = core.getInput(c.INPUT_TEMPLATE_PATH, {required: true})
    const measurements = parseMeasurements(core.getInput(c.INPUT_MEASUREMENTS))
    const failOnTargetExitCode =
      core.getInput(c.INPUT_FAIL_ON_TARGET_EXIT_CODE) !== 'false'
    const enableJobSummary = core.getInput(c.INPUT_JOB_SUMMARY) === 'true'

    const toolchain = createToolchain(resolveArtifacts(templatePath), {
      assigner: core.getInput(c.INPUT_ASSIGNER),
      proofGenerator: core.getInput(c.INPUT_PROOF_GENERATOR),
      curve: core.getInput(c.INPUT_CURVE)
    })
    const benchmark = new Benchmark({
      toolchain,
      workingDirectory: core.getInput(c.INPUT_WORKING_DIRECTORY),
      failOnTargetExitCode
    })

    const failed: MetricSlot[] = []
    for (const slot of measurements) {
      core.startGroup(`Measuring ${slot}...`)
      try {
        const metric = await benchmark.measure(slot)
        core.setOutput(c.SLOT_OUTPUTS[slot], metric.value)
      } catch (error) {
        if (!isBenchmarkError(error)) {
          throw error
        }
        core.error(`Measuring ${slot} failed: ${error.message}`)
        failed.push(slot)
      } finally {
        core.endGroup()
      }
    }

    let results: string | undefined
    try {
      results = benchmark.displayResults()
    } catch (error) {
      if (!(error instanceof IncompleteResultsError)) {
        throw error
      }
      core.warning(error.message)
    }
    if (results !== undefined) {
      core.info(SUMMARY_TITLE)
      core.info(results)
      if (enableJobSummary) {
        core.summary.addRaw(renderSummaryTable(benchmark.state.snapshot()))
        await core.summary.write()
      }
    }

    if (failed.length > 0) {
      core.setFailed(`Failed measurements: ${failed.join(', ')}`)
    }
  } catch (error) {
    if (error instanceof Error) core.setFailed(error.message)
  }
}

if (require.main === module) {
  void run()
}
